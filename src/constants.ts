/**
 * Storage MCP Gateway Constants
 * Fixed values that are not read from the environment.
 */

// ===========================================
// Server Info
// ===========================================
export const SERVER_NAME = 'storage-mcp-gateway';
export const SERVER_VERSION = '1.0.0';
export const PROTOCOL_VERSION = '2024-11-05';

// ===========================================
// Context Budget
// ===========================================
export const CONTEXT_LIMITS = {
  // Listing above this size is an error (raised under enforcement)
  HARD_LIMIT: 7600,

  // Listing above this size logs a warning
  WARN_THRESHOLD: 5000,

  // Characters per token for the approximate estimator
  APPROX_CHARS_PER_TOKEN: 4,

  // Encoding used when tiktoken is available
  TIKTOKEN_ENCODING: 'cl100k_base',
} as const;

// ===========================================
// Gating
// ===========================================
export const META_TASK_TYPE = 'meta-ops';
export const ADMIN_SCOPE = 'admin';
export const FALLBACK_TASK_TYPE = 'appliance-ops';

// ===========================================
// Tool Pagination
// ===========================================
export const PAGINATION = {
  DEFAULT_LIMIT: 100,
  MAX_LIMIT: 500,
} as const;

// ===========================================
// HTTP Defaults
// ===========================================
export const HTTP_DEFAULTS = {
  PORT: 8000,
  MAX_BODY_SIZE: '1mb',
  MCP_PATH: '/mcp',
} as const;

// ===========================================
// Appliance Client Defaults
// ===========================================
export const APPLIANCE_DEFAULTS = {
  API_PREFIX: '/api/v2.0',
  TIMEOUT_MS: 30000,
  MAX_RETRIES: 3,
  RETRY_BACKOFF_MS: 1000,
} as const;
