/**
 * Error types raised by the allocation engine
 */

/**
 * Base class for every error the engine raises on purpose
 */
export class PlanogramError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlanogramError';
  }
}

/**
 * Invalid product records, store layouts or engine options
 */
export class ConfigurationError extends PlanogramError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Fatal failure of an allocation run. The underlying error is kept as `cause`.
 */
export class OptimizationError extends PlanogramError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Optimization failed: ${reason}`, { cause });
    this.name = 'OptimizationError';
  }
}

/**
 * Raised inside a run when the store rules leave nothing to place
 */
export class NoProductsError extends PlanogramError {
  constructor() {
    super('No products remain after filtering');
    this.name = 'NoProductsError';
  }
}
