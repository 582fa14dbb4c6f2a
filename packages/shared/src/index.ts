// Browser-safe entrypoint for @pegfee/shared.
//
// Do NOT export Node-only modules here (the pino logger).
// Server-side code should import those from "@pegfee/shared/server".

export * from './units';
export * from './schemas';
export * from './format';
