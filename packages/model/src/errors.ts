/**
 * Model Package - Errors
 *
 * Fatal conditions raise a ViewBindError carrying a stable code. Per-field
 * problems (missing paths, missing capabilities, recovered markers) are not
 * errors; they surface as warnings or statistics.
 */

/**
 * Error raised by viewbind services.
 */
export class ViewBindError extends Error {
  constructor(
    message: string,
    public readonly code: ViewBindErrorCodeType,
    public readonly rootIdentity?: string,
    public readonly file?: string
  ) {
    super(message);
    this.name = "ViewBindError";
  }
}

/** Error codes */
export const ViewBindErrorCode = {
  INVALID_NAME: "VIEWBIND_INVALID_NAME",
  INVALID_SETTINGS: "VIEWBIND_INVALID_SETTINGS",
  TEMPLATE_NOT_FOUND: "VIEWBIND_TEMPLATE_NOT_FOUND",
  CLASS_NOT_FOUND: "VIEWBIND_CLASS_NOT_FOUND",
} as const;

export type ViewBindErrorCodeType = (typeof ViewBindErrorCode)[keyof typeof ViewBindErrorCode];

/**
 * Non-fatal condition reported alongside a result.
 */
export interface ViewBindWarning {
  code: ViewBindWarningCodeType;
  message: string;
  file?: string;

  /** Managed region the warning concerns */
  region?: string;
}

/** Warning codes */
export const ViewBindWarningCode = {
  MARKER_RECOVERY: "VIEWBIND_MARKER_RECOVERY",
} as const;

export type ViewBindWarningCodeType = (typeof ViewBindWarningCode)[keyof typeof ViewBindWarningCode];

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
