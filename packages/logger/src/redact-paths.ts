/**
 * Default sensitive field paths for redaction.
 *
 * These paths are used when `redact: true` is set, and merged with custom
 * paths unless `resolution: 'override'` is specified. They cover the shapes
 * in which Cassandra credentials travel through client options.
 */
export const DEFAULT_REDACT_PATHS: string[] = [
  'password',
  'secret',
  'token',
  'credentials',
  'authProvider',

  // Nested client options
  '*.password',
  '*.secret',
  '*.token',
  'credentials.password',
  'options.credentials',
  'options.authProvider',

  // Connection strings
  'connectionString',
  'contactPointUrl',
];
