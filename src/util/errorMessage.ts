import { types } from 'node:util';

/**
 * Message of a thrown value. Native errors are recognized by brand, so errors created
 * in another realm (a vm context, a test sandbox) still report only their message.
 */
export function errorMessage(e: unknown): string {
  return types.isNativeError(e) ? e.message : String(e);
}
