/**
 * Error Code Infrastructure
 * Stable error codes shared by every engine error.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Definition Errors (E001–E099)
  UNKNOWN_OPTION = 'E001',
  INVALID_OPTION_VALUE = 'E002',
  UNKNOWN_STRATEGY = 'E003',
  CYCLIC_PARAMETERS = 'E010',
  UNKNOWN_DEEP_CONTEXT = 'E011',
  INVALID_DECLARATION = 'E012',

  // Sequence Errors (E100–E199)
  SEQUENCE_OWNERSHIP = 'E100',

  // Evaluation Errors (E200–E299)
  ABSTRACT_FACTORY = 'E200',
  UNSUPPORTED_STRATEGY = 'E201',
  CYCLIC_ATTRIBUTE = 'E202',
  UNKNOWN_ATTRIBUTE = 'E203',

  // Introspection Errors (E300–E399)
  INTROSPECTOR_MISSING_RECIPE = 'E300',
  INTROSPECTOR_UNREQUESTED_FIELD = 'E301',

  // Configuration Errors (E400–E499)
  CONFIGURATION_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const ERROR_CATEGORY = {
  [ErrorCode.UNKNOWN_OPTION]: 'definition',
  [ErrorCode.INVALID_OPTION_VALUE]: 'definition',
  [ErrorCode.UNKNOWN_STRATEGY]: 'definition',
  [ErrorCode.CYCLIC_PARAMETERS]: 'definition',
  [ErrorCode.UNKNOWN_DEEP_CONTEXT]: 'definition',
  [ErrorCode.INVALID_DECLARATION]: 'definition',
  [ErrorCode.SEQUENCE_OWNERSHIP]: 'usage',
  [ErrorCode.ABSTRACT_FACTORY]: 'usage',
  [ErrorCode.UNSUPPORTED_STRATEGY]: 'usage',
  [ErrorCode.CYCLIC_ATTRIBUTE]: 'usage',
  [ErrorCode.UNKNOWN_ATTRIBUTE]: 'usage',
  [ErrorCode.INTROSPECTOR_MISSING_RECIPE]: 'usage',
  [ErrorCode.INTROSPECTOR_UNREQUESTED_FIELD]: 'usage',
  [ErrorCode.CONFIGURATION_ERROR]: 'definition',
  [ErrorCode.INTERNAL_ERROR]: 'internal',
} as const satisfies Record<ErrorCode, 'definition' | 'usage' | 'internal'>;

export type ErrorCategory = (typeof ERROR_CATEGORY)[ErrorCode];

export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return ERROR_CATEGORY[code];
}
