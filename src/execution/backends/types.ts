export interface ProcessSpec {
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface ProcessLimits {
  timeoutSeconds: number;
  killGraceSeconds: number;
  signal?: AbortSignal;
}

interface ProcessOutcomeBase {
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

export type BoundedRunResult =
  | (ProcessOutcomeBase & { kind: "exited"; exitCode: number | null; signal: NodeJS.Signals | null })
  | (ProcessOutcomeBase & { kind: "timed_out"; timeoutSeconds: number })
  | (ProcessOutcomeBase & { kind: "aborted"; reason: unknown });

export interface ProcessRunner {
  run(spec: ProcessSpec, limits: ProcessLimits): Promise<BoundedRunResult>;
}
