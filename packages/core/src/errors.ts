export class TraceReadError extends Error {
  readonly path: string;
  readonly hint: string;

  constructor(filePath: string, cause: unknown) {
    const code = cause && typeof cause === "object" && "code" in cause ? String(cause.code) : "";
    const hint =
      code === "ENOENT"
        ? "no trace file at this path; check the run id or --runs-dir"
        : code === "EACCES" || code === "EPERM"
          ? "permission denied"
          : cause instanceof Error
            ? cause.message
            : String(cause);
    super(`cannot read trace file ${filePath}: ${hint}`, { cause });
    this.name = "TraceReadError";
    this.path = filePath;
    this.hint = hint;
  }
}

export class UnknownRunError extends Error {
  readonly runId: string;

  constructor(runId: string, runsDirectory: string) {
    super(`run not found: ${runId} (looked in ${runsDirectory})`);
    this.name = "UnknownRunError";
    this.runId = runId;
  }
}
