import { promises as fs } from "fs";
import path from "path";
import type { JobId } from "../core/ids.js";
import { JobServiceError, errorMessage } from "../core/errors.js";

export interface JobWorkspace {
  jobId: JobId;
  rootDir: string;
  inDir: string;
  outDir: string;
  inPath(name: string): string;
  outPath(name: string): string;
}

function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

export { safeJoin };

/**
 * A workspace directory that could not be deleted and is still on disk.
 * `runError` is what the work inside the workspace threw, if anything.
 */
export class WorkspaceReleaseError extends JobServiceError {
  constructor(
    readonly workspacePath: string,
    message: string,
    readonly runError: unknown = null
  ) {
    super("WorkspaceError", message);
    this.name = "WorkspaceReleaseError";
  }
}

export class WorkspaceManager {
  constructor(private readonly rootDir: string) {}

  async acquire(jobId: JobId): Promise<JobWorkspace> {
    let root: string | null = null;
    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      // mkdtemp creates the directory with mode 0700.
      root = await fs.mkdtemp(path.join(path.resolve(this.rootDir), `${jobId}-`));
      const { inDir, outDir } = await this.createLayout(root);

      return {
        jobId,
        rootDir: root,
        inDir,
        outDir,
        inPath: (name: string) => safeJoin(inDir, name),
        outPath: (name: string) => safeJoin(outDir, name)
      };
    } catch (e) {
      let message = `failed to create workspace for ${jobId}: ${errorMessage(e)}`;
      if (root !== null) {
        try {
          await fs.rm(root, { recursive: true, force: true });
        } catch (rmError) {
          message += ` (could not remove ${root}: ${errorMessage(rmError)})`;
        }
      }
      throw new JobServiceError("WorkspaceError", message);
    }
  }

  protected async createLayout(root: string): Promise<{ inDir: string; outDir: string }> {
    const inDir = path.join(root, "in");
    const outDir = path.join(root, "out");
    await fs.mkdir(inDir);
    await fs.mkdir(outDir);
    return { inDir, outDir };
  }

  async release(workspace: JobWorkspace | string): Promise<void> {
    const dir = typeof workspace === "string" ? workspace : workspace.rootDir;
    const rel = path.relative(path.resolve(this.rootDir), path.resolve(dir));
    if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
      throw new WorkspaceReleaseError(dir, `refusing to delete path outside workspace root: ${dir}`);
    }
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (e) {
      throw new WorkspaceReleaseError(dir, `failed to delete workspace ${dir}: ${errorMessage(e)}`);
    }
  }

  /**
   * Runs `fn` with a fresh workspace and deletes it on every exit path. A
   * release failure surfaces as WorkspaceReleaseError after `fn` has settled,
   * carrying whatever `fn` threw.
   */
  async withWorkspace<T>(jobId: JobId, fn: (workspace: JobWorkspace) => Promise<T>): Promise<T> {
    const workspace = await this.acquire(jobId);
    let result: T;
    try {
      result = await fn(workspace);
    } catch (e) {
      try {
        await this.release(workspace);
      } catch (releaseError) {
        if (releaseError instanceof WorkspaceReleaseError) {
          throw new WorkspaceReleaseError(releaseError.workspacePath, releaseError.message, e);
        }
        throw releaseError;
      }
      throw e;
    }
    await this.release(workspace);
    return result;
  }
}
