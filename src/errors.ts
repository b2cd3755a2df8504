export class DifftraceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotARepositoryError extends DifftraceError {
  constructor() {
    super('Not a git repository. Run difftrace from within a git repo.');
  }
}

export class UnresolvableRefError extends DifftraceError {
  readonly ref: string;

  constructor(ref: string) {
    super(
      `Could not resolve ref '${ref}'. Does the branch/ref exist? ` +
        "Try 'git fetch' or set `base-ref` to a valid ref."
    );
    this.ref = ref;
  }
}

export class DiffFailedError extends DifftraceError {
  readonly stderr: string;

  constructor(stderr: string) {
    super(`git diff failed: ${stderr}`);
    this.stderr = stderr;
  }
}

export class InvalidConfigError extends DifftraceError {}
