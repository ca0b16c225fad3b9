import {
  ConfirmationPolicy,
  applyDecisionPolicy,
  renderWarningPrompt,
  requireProceed,
} from './decision-policy';
import type {
  AdvisoryWarning,
  ConfirmFn,
  Decision,
  DecisionPolicy,
  WarningCategory,
} from './types';

export {
  ConfirmationPolicy,
  applyDecisionPolicy,
  renderWarningPrompt,
  requireProceed,
};
export type { AdvisoryWarning, ConfirmFn, Decision, DecisionPolicy, WarningCategory };
