export type RuleLoopErrorCode =
  | 'CONFIG_ERROR'
  | 'DUPLICATE_RULE_ID'
  | 'CYCLIC_ORDER_CONSTRAINT'
  | 'UNSATISFIABLE_GOAL'
  | 'RULE_CONFLICT'
  | 'ACTION_FAILURE'
  | 'INVALID_PROPOSAL'
  | 'BUDGET_EXCEEDED'
  | 'UNKNOWN_VERSION';

export type RuleLoopStage = 'config' | 'rules' | 'build' | 'execute' | 'reflect' | 'control' | 'apply';

export class RuleLoopError extends Error {
  constructor(
    message: string,
    public readonly code: RuleLoopErrorCode,
    public readonly stage?: RuleLoopStage,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'RuleLoopError';
  }
}

export class ConfigError extends RuleLoopError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class DuplicateRuleIdError extends RuleLoopError {
  constructor(public readonly ruleId: string) {
    super(`Rule "${ruleId}" already exists`, 'DUPLICATE_RULE_ID', 'rules');
    this.name = 'DuplicateRuleIdError';
  }
}

export class CyclicOrderConstraintError extends RuleLoopError {
  constructor(public readonly cycle: string[]) {
    super(`Order constraints form a cycle: ${cycle.join(' -> ')}`, 'CYCLIC_ORDER_CONSTRAINT', 'rules');
    this.name = 'CyclicOrderConstraintError';
  }
}

export class UnsatisfiableGoalError extends RuleLoopError {
  constructor(
    public readonly goal: string,
    public readonly action: string,
    public readonly key: string,
    public readonly ruleId: string,
  ) {
    super(
      `Goal "${goal}" is unsatisfiable: no action produces "${key}" required by rule ${ruleId} before ${action}`,
      'UNSATISFIABLE_GOAL',
      'build',
    );
    this.name = 'UnsatisfiableGoalError';
  }
}

export class RuleConflictError extends RuleLoopError {
  constructor(
    public readonly key: string,
    public readonly ruleIds: [string, string],
    detail: string,
  ) {
    super(`Rules ${ruleIds[0]} and ${ruleIds[1]} conflict on "${key}": ${detail}`, 'RULE_CONFLICT', 'build');
    this.name = 'RuleConflictError';
  }
}

/**
 * Why a capability call failed. `missing` and `requiredAction` are optional
 * hints a capability can attach; reflection uses them to pick an edit.
 */
export type FailureCode = 'MISSING_PRECONDITION' | 'ORDER_VIOLATION' | 'TIMEOUT' | 'CAPABILITY_ERROR';

export interface ActionFailureDetail {
  code?: FailureCode;
  missing?: { key: string; value: string | number | boolean | null };
  requiredAction?: string;
}

export class ActionFailureError extends RuleLoopError {
  public readonly failureCode: FailureCode;
  public readonly missing?: ActionFailureDetail['missing'];
  public readonly requiredAction?: string;

  constructor(public readonly reason: string, detail: ActionFailureDetail = {}, cause?: Error) {
    super(`Action failed: ${reason}`, 'ACTION_FAILURE', 'execute', cause);
    this.name = 'ActionFailureError';
    this.failureCode = detail.code ?? 'CAPABILITY_ERROR';
    this.missing = detail.missing;
    this.requiredAction = detail.requiredAction;
  }
}

export class InvalidProposalError extends RuleLoopError {
  constructor(message: string, public readonly proposalId?: string) {
    super(proposalId ? `Invalid proposal ${proposalId}: ${message}` : `Invalid proposal: ${message}`, 'INVALID_PROPOSAL', 'reflect');
    this.name = 'InvalidProposalError';
  }
}

export type BudgetDimension = 'patches' | 'ruleCount';

export class BudgetExceededError extends RuleLoopError {
  constructor(
    public readonly dimension: BudgetDimension,
    public readonly used: number,
    public readonly requested: number,
    public readonly limit: number,
  ) {
    super(
      `Budget exceeded: ${dimension} used ${used} + ${requested} would exceed limit ${limit}`,
      'BUDGET_EXCEEDED',
      'control',
    );
    this.name = 'BudgetExceededError';
  }
}

export class UnknownVersionError extends RuleLoopError {
  constructor(public readonly version: string) {
    super(`Version "${version}" was never recorded`, 'UNKNOWN_VERSION', 'apply');
    this.name = 'UnknownVersionError';
  }
}

export function isRuleLoopError(err: unknown, code?: RuleLoopErrorCode): err is RuleLoopError {
  if (!(err instanceof RuleLoopError)) return false;
  return code === undefined || err.code === code;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
