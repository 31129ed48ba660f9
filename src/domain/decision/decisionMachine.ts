import { InvalidTransitionError } from '../../errors/taxonomy.js';
import { Decision, DecisionOutcome, DecisionOutcomeRecord, DecisionState, DecisionView } from '../../types.js';

const TRANSITIONS: Record<DecisionState, readonly DecisionOutcome[]> = {
  proposed: ['accepted', 'modified', 'rejected'],
  accepted: [],
  modified: [],
  rejected: [],
};

export const stateOf = (outcome: DecisionOutcomeRecord | undefined): DecisionState => outcome?.outcome ?? 'proposed';

export const isTerminal = (state: DecisionState): boolean => TRANSITIONS[state].length === 0;

export function assertTransition(decisionId: string, from: DecisionState, to: DecisionOutcome): void {
  if (!TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError(
      `Decision '${decisionId}' is ${from}; it cannot become ${to}.`,
      { type: 'decision', id: decisionId },
      { from, to },
    );
  }
}

export const toDecisionView = (decision: Decision, outcome: DecisionOutcomeRecord | undefined): DecisionView => ({
  ...decision,
  state: stateOf(outcome),
  outcome: outcome ?? null,
});
