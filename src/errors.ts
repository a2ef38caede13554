export class StateCorruptError extends Error {
  statePath: string;
  issues: string[];

  constructor(message: string, statePath: string, issues: string[] = []) {
    super(message);
    this.name = 'StateCorruptError';
    this.statePath = statePath;
    this.issues = issues;
  }
}

export class RunNotFoundError extends Error {
  statePath: string;

  constructor(message: string, statePath: string) {
    super(message);
    this.name = 'RunNotFoundError';
    this.statePath = statePath;
  }
}

export class RunAlreadyExistsError extends Error {
  statePath: string;
  runId: string | null;

  constructor(message: string, statePath: string, runId: string | null) {
    super(message);
    this.name = 'RunAlreadyExistsError';
    this.statePath = statePath;
    this.runId = runId;
  }
}

/** An operation would break the Run's invariants or its stage lifecycle. */
export class RunStateError extends Error {
  stage: string | null;

  constructor(message: string, stage: string | null = null) {
    super(message);
    this.name = 'RunStateError';
    this.stage = stage;
  }
}

export class RunLockedError extends Error {
  lockPath: string;
  pid: number;

  constructor(message: string, lockPath: string, pid: number) {
    super(message);
    this.name = 'RunLockedError';
    this.lockPath = lockPath;
    this.pid = pid;
  }
}

export class RuntimeInterruptedError extends Error {
  signal: string;
  exitCode: number;

  constructor(message: string, signal: string, exitCode: number) {
    super(message);
    this.name = 'RuntimeInterruptedError';
    this.signal = signal;
    this.exitCode = exitCode;
  }
}
