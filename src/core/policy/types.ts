export type Decision = 'proceed' | 'abort';

export type AdvisoryWarning =
  | { category: 'unincluded-modifications'; paths: readonly string[] }
  | { category: 'missing-paths'; paths: readonly string[] }
  | { category: 'source-path-mismatch'; sourcePath: string; workingCopyRoot: string };

export type WarningCategory = AdvisoryWarning['category'];

/**
 * Turns an advisory warning into a decision. Implementations must not
 * reconcile anything themselves.
 */
export interface DecisionPolicy {
  decide(warning: AdvisoryWarning): Promise<Decision>;
}

/**
 * Single yes/no interaction surface. Receives the full prompt text.
 */
export type ConfirmFn = (promptText: string) => Promise<boolean>;
