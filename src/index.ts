// Public library surface.

export const VERSION = '0.1.0';

export * from './flags/flagTypes';
export * from './flags/declarations';
export * from './flags/errors';
export * from './flags/coerce';
export * from './flags/parseFlags';
export * from './flags/renderHelp';
export * from './table/flagTableFile';
export * from './util/deterministicJson';
