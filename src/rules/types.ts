/**
 * Rule model types.
 *
 * A rule is a tagged variant: the `body.kind` decides what it contributes when
 * a DAG is built. Every kind may additionally carry an `order` constraint.
 */

// ─── World state ────────────────────────────────────────────────────────────

export type StateValue = string | number | boolean | null;

/** Flat key/value facts a rule's conditions are evaluated against */
export type WorldState = Readonly<Record<string, StateValue>>;

// ─── Actions ────────────────────────────────────────────────────────────────

export type ActionParams = Readonly<Record<string, StateValue>>;

export interface Action {
  readonly name: string;
  readonly params: ActionParams;
}

// ─── Conditions ─────────────────────────────────────────────────────────────

export type ConditionOperator = 'eq' | 'neq' | 'exists' | 'absent';

export interface RuleCondition {
  key: string;
  operator: ConditionOperator;
  /** Compared value for `eq` / `neq`; ignored otherwise */
  value?: StateValue;
}

// ─── Rule bodies ────────────────────────────────────────────────────────────

/** Before `action` runs, the world must hold every `requires` entry */
export interface PreconditionBody {
  kind: 'precondition';
  action: string;
  requires: Record<string, StateValue>;
}

/** Running `action` establishes every `produces` entry */
export interface EffectBody {
  kind: 'effect';
  action: Action;
  produces: Record<string, StateValue>;
}

/** A pure ordering rule; its constraint lives in `Rule.order` */
export interface OrderBody {
  kind: 'order';
}

export type RuleBody = PreconditionBody | EffectBody | OrderBody;
export type RuleKind = RuleBody['kind'];

export interface OrderConstraint {
  /** Action the constraint applies to */
  action: string;
  /** Actions that must complete before `action` */
  mustFollow: string[];
}

// ─── Metadata & lifecycle ───────────────────────────────────────────────────

export type RuleStatus = 'ACTIVE' | 'COOLDOWN' | 'DEPRECATED';

export interface RuleMetadata {
  successCount: number;
  failureCount: number;
  /** 0-1 */
  confidence: number;
  status: RuleStatus;
  lastUpdated: number;
  /** Consecutive stats cycles spent below the cooldown threshold */
  lowConfidenceStreak: number;
}

export interface Rule {
  id: string;
  description: string;
  conditions: RuleCondition[];
  body: RuleBody;
  order?: OrderConstraint;
  metadata: RuleMetadata;
}

/** Input form of a rule: metadata is filled in on creation */
export interface RuleDefinition {
  id: string;
  description?: string;
  conditions: RuleCondition[];
  body: RuleBody;
  order?: OrderConstraint;
  metadata?: Partial<RuleMetadata>;
}

export type RuleStatusCounts = Record<RuleStatus, number> & { total: number };

// ─── Constraints (uniform view over rule kinds) ─────────────────────────────

export type RuleConstraint =
  | { type: 'requires'; key: string; value: StateValue }
  | { type: 'produces'; key: string; value: StateValue }
  | { type: 'follows'; predecessor: string };
