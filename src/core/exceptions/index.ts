/**
 * Base class for every failure that ends a commit attempt.
 */
export class RevisionCommitException extends Error {
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'RevisionCommitException';
    this.cause = cause;
  }
}

/**
 * The command cannot run as requested: nothing is committable, the chosen
 * revision is not committable, or the working copy's VCS does not support it.
 */
export class UsageException extends RevisionCommitException {
  readonly hint: string | null;

  constructor(message: string, hint: string | null = null) {
    super(message);
    this.name = 'UsageException';
    this.hint = hint;
  }
}

/**
 * A declared directory would sweep in a locally modified descendant that the
 * revision does not include.
 */
export class ConflictException extends RevisionCommitException {
  readonly directory: string;
  readonly path: string;

  constructor(directory: string, path: string) {
    super(
      `This commit includes the directory '${directory}', but it contains a modified ` +
        `path ('${path}') which is NOT included in the commit. Subversion can not handle ` +
        `this operation and will commit the path anyway. You need to sort out the working ` +
        `copy changes to '${path}' before you may proceed with the commit.`
    );
    this.name = 'ConflictException';
    this.directory = directory;
    this.path = path;
  }
}

export class UserAbortException extends RevisionCommitException {
  constructor(message: string = 'User aborted the workflow.') {
    super(message);
    this.name = 'UserAbortException';
  }
}

export class EmptyCommitException extends RevisionCommitException {
  readonly missingPaths: readonly string[];

  constructor(missingPaths: readonly string[]) {
    super('There is nothing left to commit. None of the modified paths exist.');
    this.name = 'EmptyCommitException';
    this.missingPaths = missingPaths;
  }
}

/**
 * The VCS commit went through but the review service was not told. Running
 * the commit again would submit the change twice.
 */
export class MarkCommittedException extends RevisionCommitException {
  readonly revisionId: number;
  readonly committedPaths: readonly string[];

  constructor(revisionId: number, committedPaths: readonly string[], cause?: Error) {
    super(
      `D${revisionId} was committed, but marking it committed on the review service failed` +
        (cause ? `: ${cause.message}` : '.'),
      cause
    );
    this.name = 'MarkCommittedException';
    this.revisionId = revisionId;
    this.committedPaths = committedPaths;
  }

  get remedy(): string {
    return `Do not commit again. Run 'revcommit mark-committed D${this.revisionId}' instead.`;
  }
}

/**
 * The review service could not be reached or answered with an error.
 */
export class TransportException extends RevisionCommitException {
  readonly method: string;
  readonly errorCode: string | null;

  constructor(method: string, message: string, errorCode: string | null = null, cause?: Error) {
    super(message, cause);
    this.name = 'TransportException';
    this.method = method;
    this.errorCode = errorCode;
  }
}

/**
 * An external tool (svn) could not be started or exited non-zero.
 */
export class ExternalToolException extends RevisionCommitException {
  readonly command: string;
  readonly exitCode: number | null;
  readonly output: string;

  constructor(
    command: string,
    message: string,
    exitCode: number | null,
    output: string,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'ExternalToolException';
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
  }
}
