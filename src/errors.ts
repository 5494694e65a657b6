/**
 * @fileoverview Error classes raised by PromptCrafter modules.
 *
 * Every error carries a stable `code` so the CLI and tests can tell failures
 * apart without matching on message text.
 *
 * @module errors
 */

export type PromptCrafterErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_UNREADABLE'
  | 'PLACEHOLDER_MISMATCH'
  | 'GENERATION_FAILED'
  | 'SCHEDULER_INVALID';

/** Base class for all errors raised by this package. */
export class PromptCrafterError extends Error {
  readonly code: PromptCrafterErrorCode;

  constructor(code: PromptCrafterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends PromptCrafterError {}

export class TemplateError extends PromptCrafterError {}

/**
 * Raised when template placeholders and config params disagree.
 */
export class PlaceholderMismatchError extends PromptCrafterError {
  /** Placeholders with no param prompt, sorted */
  readonly missingInConfig: string[];
  /** Params with no placeholder, sorted */
  readonly missingInTemplate: string[];

  constructor(missingInConfig: string[], missingInTemplate: string[]) {
    super('PLACEHOLDER_MISMATCH', 'Template and config placeholders do not match');
    this.missingInConfig = missingInConfig;
    this.missingInTemplate = missingInTemplate;
  }
}

export class GenerationError extends PromptCrafterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options);
  }
}

export class SchedulerError extends PromptCrafterError {
  constructor(message: string) {
    super('SCHEDULER_INVALID', message);
  }
}
