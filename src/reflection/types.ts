import type { InvalidProposalError } from '../core/errors.js';
import type { BuildTrace, Goal } from '../dag/types.js';
import type { ExecutionReport, FailureInfo } from '../engine/types.js';
import type { PatchProposal } from '../patch/types.js';
import type { Action, Rule } from '../rules/types.js';

/** A FAILED node and the rules held responsible for it */
export interface Blame {
  taskId: string;
  version: string;
  goal: Goal;
  nodeId: string;
  action: Action;
  failure: FailureInfo;
  ruleIds: string[];
}

export interface FailedNodeContext {
  nodeId: string;
  action: Action;
  failure: FailureInfo;
  ruleIds: string[];
}

/** What an advisor sees about one failing run */
export interface FailureContext {
  taskId: string;
  version: string;
  goal: Goal;
  status: ExecutionReport['status'];
  failedNodes: FailedNodeContext[];
  skippedNodeIds: string[];
  trace: BuildTrace;
  rules: Rule[];
}

/**
 * External proposal source. Returns raw candidates; nothing it returns is
 * trusted before validation.
 */
export interface Advisor {
  propose(context: FailureContext, signal: AbortSignal): Promise<unknown[]>;
}

export interface AdvisorReflection {
  proposals: PatchProposal[];
  rejected: InvalidProposalError[];
  timedOut: boolean;
  /** Set when the advisor itself failed */
  advisorError?: string;
}
