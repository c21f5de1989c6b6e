import { promises as fs } from "fs";
import path from "path";
import type { JobRequest, OutputFormat } from "../core/job.js";
import type { JobWorkspace } from "./workspace.js";

export interface InterProScanInvocation {
  argv: string[];
  declaredOutputs: Array<{ name: string; format: OutputFormat; path: string }>;
}

/** Input names staged into the workspace keep only a conservative character set. */
export function stagedInputName(inputFile: string): string {
  const base = path.basename(inputFile).replace(/[^A-Za-z0-9._-]/g, "_");
  const trimmed = base.replace(/^\.+/, "");
  return trimmed.length > 0 ? trimmed : "input.fasta";
}

export function buildInterProScanInvocation(input: {
  toolPath: string;
  disablePrecalc: boolean;
  request: Readonly<JobRequest>;
  workspace: JobWorkspace;
  stagedInputPath: string;
}): InterProScanInvocation {
  const { request, workspace } = input;
  const argv = [
    input.toolPath,
    "-i",
    input.stagedInputPath,
    "-f",
    request.outputFormats.map((f) => f.toUpperCase()).join(","),
    "-d",
    workspace.outDir
  ];

  if (input.disablePrecalc) argv.push("--disable-precalc");
  if (request.databases.length > 0) argv.push("-appl", request.databases.join(","));
  if (request.goterms) argv.push("--goterms");
  if (request.pathways) argv.push("--pathways");

  // With -d, InterProScan names each output after the input file plus the format extension.
  const inputBase = path.basename(input.stagedInputPath);
  const declaredOutputs = request.outputFormats.map((format) => {
    const name = `${inputBase}.${format}`;
    return { name, format, path: workspace.outPath(name) };
  });

  return { argv, declaredOutputs };
}

export async function missingOutputs(declared: InterProScanInvocation["declaredOutputs"]): Promise<string[]> {
  const missing: string[] = [];
  for (const out of declared) {
    const st = await fs.stat(out.path).catch(() => null);
    if (!st || !st.isFile()) missing.push(out.name);
  }
  return missing;
}
