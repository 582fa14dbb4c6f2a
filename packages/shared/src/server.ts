// Node/server-only entrypoint for @pegfee/shared

export * from './units';
export * from './schemas';
export * from './format';
export * from './logger';
