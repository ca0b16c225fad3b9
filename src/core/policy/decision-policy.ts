import { UserAbortException } from '@/core/exceptions';
import { ReconciliationResult } from '@/core/reconcile';
import { AdvisoryWarning, ConfirmFn, Decision, DecisionPolicy } from './types';

/**
 * Renders the prompt shown for a warning. Singular and plural variants differ
 * only in wording.
 */
export const renderWarningPrompt = (warning: AdvisoryWarning): string => {
  switch (warning.category) {
    case 'unincluded-modifications': {
      const single = warning.paths.length === 1;
      const prefix = single
        ? 'A locally modified path is not included in this revision:'
        : 'Locally modified paths are not included in this revision:';
      const question = single
        ? 'It will NOT be committed. Commit this revision anyway?'
        : 'They will NOT be committed. Commit this revision anyway?';
      return formatFileWarning(prefix, question, warning.paths);
    }
    case 'missing-paths': {
      const prefix =
        warning.paths.length === 1
          ? 'Revision includes changes to a path that does not exist:'
          : 'Revision includes changes to paths that do not exist:';
      return formatFileWarning(prefix, 'Commit this revision anyway?', warning.paths);
    }
    case 'source-path-mismatch':
      return (
        `Revision was generated from '${warning.sourcePath}', but the current working ` +
        `copy root is '${warning.workingCopyRoot}'. Commit anyway?`
      );
  }
};

const formatFileWarning = (prefix: string, question: string, paths: readonly string[]): string => {
  const list = paths.map((path) => `    ${path}`).join('\n');
  return `${prefix}\n\n${list}\n\n${question}`;
};

/**
 * Asks a yes/no question for every warning.
 */
export class ConfirmationPolicy implements DecisionPolicy {
  constructor(private readonly confirm: ConfirmFn) {}

  async decide(warning: AdvisoryWarning): Promise<Decision> {
    const accepted = await this.confirm(renderWarningPrompt(warning));
    return accepted ? 'proceed' : 'abort';
  }
}

/**
 * Throws UserAbortException unless the policy lets the warning through.
 */
export const requireProceed = async (
  policy: DecisionPolicy,
  warning: AdvisoryWarning
): Promise<void> => {
  const decision = await policy.decide(warning);
  if (decision === 'abort') {
    throw new UserAbortException();
  }
};

/**
 * Puts the advisory categories of a reconciliation in front of the policy:
 * unincluded modifications first, then missing paths. Empty categories are
 * skipped.
 */
export const applyDecisionPolicy = async (
  result: ReconciliationResult,
  policy: DecisionPolicy
): Promise<void> => {
  if (result.unincludedModifications.length > 0) {
    await requireProceed(policy, {
      category: 'unincluded-modifications',
      paths: result.unincludedModifications,
    });
  }

  if (result.missingPaths.length > 0) {
    await requireProceed(policy, { category: 'missing-paths', paths: result.missingPaths });
  }
};
