export const ErrorCode = {
  CONFIG_INVALID_SETTINGS: 'CONFIG_INVALID_SETTINGS',
  CONFIG_MISSING_API_CREDENTIALS: 'CONFIG_MISSING_API_CREDENTIALS',
  CONFIG_SECRET_DECRYPT_FAILED: 'CONFIG_SECRET_DECRYPT_FAILED',
  NO_DEFAULT_MAPPING: 'NO_DEFAULT_MAPPING',
  MULTIPLE_DEFAULT_MAPPINGS: 'MULTIPLE_DEFAULT_MAPPINGS',
  MAPPING_AMBIGUOUS: 'MAPPING_AMBIGUOUS',

  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVENTORY_OBJECT_NOT_FOUND: 'INVENTORY_OBJECT_NOT_FOUND',
  HOST_CONFIG_NOT_FOUND: 'HOST_CONFIG_NOT_FOUND',
  MAINTENANCE_CONFLICT: 'MAINTENANCE_CONFLICT',
  MAINTENANCE_WINDOW_NOT_FOUND: 'MAINTENANCE_WINDOW_NOT_FOUND',
  MAPPING_RULE_NOT_FOUND: 'MAPPING_RULE_NOT_FOUND',

  REMOTE_AUTH_FAILED: 'REMOTE_AUTH_FAILED',
  REMOTE_COMMUNICATION_FAILED: 'REMOTE_COMMUNICATION_FAILED',
  REMOTE_INVALID_RESPONSE: 'REMOTE_INVALID_RESPONSE',
  REMOTE_HOST_NOT_FOUND: 'REMOTE_HOST_NOT_FOUND',
  REMOTE_CREATE_FAILED: 'REMOTE_CREATE_FAILED',
  PARTIAL_PROVISIONING_FAILURE: 'PARTIAL_PROVISIONING_FAILURE',
  CATALOG_TOO_MANY_DELETIONS: 'CATALOG_TOO_MANY_DELETIONS',

  DB_READ_FAILED: 'DB_READ_FAILED',
  DB_WRITE_FAILED: 'DB_WRITE_FAILED',

  JOB_UNKNOWN_KIND: 'JOB_UNKNOWN_KIND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
