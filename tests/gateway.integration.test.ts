import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ListToolsResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import {
  zCancelJobOutput,
  zInterproRunAsyncOutput,
  zJobResultOutput,
  zJobStatusOutput,
  zListJobsOutput
} from "../src/mcp/toolSchemas.js";
import { createJobService, type JobServiceParts } from "../src/service/createJobService.js";
import { testConfig, waitFor, waitForSettled, writeFasta, writeMockTool } from "./helpers.js";

function textOf(result: CallToolResult): string {
  return result.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n");
}

describe.sequential("gateway (in-memory)", () => {
  let tmpDir: string;
  let toolDir: string;
  let parts: JobServiceParts;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  async function callTool(name: string, args: Record<string, unknown>, timeoutMs = 60_000): Promise<CallToolResult> {
    return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema, { timeout: timeoutMs });
  }

  async function callOk(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    const result = await callTool(name, args);
    if (result.isError) throw new Error(`${name} failed: ${textOf(result)}`);
    return result;
  }

  async function submit(args: Record<string, unknown>): Promise<string> {
    const result = await callOk("interpro_run_async", args);
    return zInterproRunAsyncOutput.parse(result.structuredContent).job_id;
  }

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "ipr-gateway-"));
    toolDir = path.join(tmpDir, "tool");
    await mkdir(toolDir);
    const toolPath = await writeMockTool(toolDir);

    parts = createJobService(testConfig(tmpDir, toolPath));
    parts.service.start();
    const server = createGatewayServer({ service: parts.service });

    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    client = new Client({ name: "ipr-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await parts.service.stop();
    await clientTransport.close();
    await serverTransport.close();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("lists the job tools", async () => {
    const result = await client.request({ method: "tools/list", params: {} }, ListToolsResultSchema);
    expect(result.tools.map((t) => t.name).sort()).toEqual([
      "cancel_job",
      "get_job_result",
      "get_job_status",
      "interpro_run_async",
      "list_my_jobs"
    ]);
  });

  it("submits, polls and fetches a result", async () => {
    const input = await writeFasta(tmpDir, "q.fasta");
    const submitted = await callOk("interpro_run_async", { input_file: input, databases: "Pfam", tags: ["flow"] });
    const receipt = zInterproRunAsyncOutput.parse(submitted.structuredContent);
    expect(receipt.job_id).toMatch(/^job_/);
    expect(receipt.state).toBe("PENDING");
    expect(receipt.priority).toBe(5);
    expect(textOf(submitted)).toMatch(/^InterProScan job submitted: job_\S+/);

    await waitForSettled(parts.store, receipt.job_id);

    const status = zJobStatusOutput.parse((await callOk("get_job_status", { job_id: receipt.job_id })).structuredContent);
    expect(status).toMatchObject({
      job_id: receipt.job_id,
      state: "COMPLETED",
      tags: ["flow"],
      error: null,
      progress: { queue_position: null, message: "completed with 1 result file(s)" }
    });

    const plain = zJobResultOutput.parse((await callOk("get_job_result", { job_id: receipt.job_id })).structuredContent);
    expect(plain.preview).toBeNull();
    expect(plain.files.map((f) => [f.name, f.format, f.size_bytes])).toEqual([["q.fasta.tsv", "tsv", 18]]);

    const withPreview = zJobResultOutput.parse(
      (await callOk("get_job_result", { job_id: receipt.job_id, preview_bytes: 1024 })).structuredContent
    );
    expect(withPreview.preview).toEqual({ file: "q.fasta.tsv", text: "seq1\tPfam\tPF00069\n", truncated: false });

    const listed = zListJobsOutput.parse((await callOk("list_my_jobs", { tag: "flow" })).structuredContent);
    expect(listed.count).toBe(1);
    expect(listed.jobs[0]).toMatchObject({ job_id: receipt.job_id, state: "COMPLETED", input_file: input });

    const cancelled = await callOk("cancel_job", { job_id: receipt.job_id });
    expect(zCancelJobOutput.parse(cancelled.structuredContent).already_terminal).toBe(true);
    expect(textOf(cancelled)).toBe(`Job ${receipt.job_id} already finished (COMPLETED); nothing to cancel.`);
  });

  it("returns service errors as tool errors with their kind", async () => {
    const missing = await callTool("get_job_status", { job_id: "job_missing" });
    expect(missing.isError).toBe(true);
    expect(textOf(missing)).toBe("JobNotFound: unknown job_id: job_missing");

    const input = await writeFasta(tmpDir, "p.fasta");
    const badPriority = await callTool("interpro_run_async", { input_file: input, priority: 11 });
    expect(badPriority.isError).toBe(true);
    expect(textOf(badPriority)).toBe("InvalidPriority: priority must be an integer in [1, 10], got 11");

    const jobId = await submit({ input_file: await writeFasta(tmpDir, "f.fasta", "fail") });
    await waitForSettled(parts.store, jobId);
    const failed = await callTool("get_job_result", { job_id: jobId });
    expect(failed.isError).toBe(true);
    expect(textOf(failed)).toBe("ToolExecutionFailed: InterProScan exited with code 3\nexit code: 3\nstderr (tail):\nmock failure for f.fasta");
  });

  it("cancels a running job", async () => {
    const jobId = await submit({ input_file: await writeFasta(tmpDir, "s.fasta", "sleep"), tags: ["long"] });
    await waitFor(() => parts.store.get(jobId).state === "RUNNING");

    const notReady = await callTool("get_job_result", { job_id: jobId });
    expect(notReady.isError).toBe(true);
    expect(textOf(notReady)).toBe(`ResultNotReady: job ${jobId} is RUNNING; poll get_job_status and try again`);

    const ack = await callOk("cancel_job", { job_id: jobId });
    expect(zCancelJobOutput.parse(ack.structuredContent)).toEqual({
      job_id: jobId,
      state: "RUNNING",
      cancel_requested: true,
      already_terminal: false
    });
    expect(textOf(ack)).toBe(`Cancellation requested for running job ${jobId}.`);

    await waitForSettled(parts.store, jobId);
    const status = zJobStatusOutput.parse((await callOk("get_job_status", { job_id: jobId })).structuredContent);
    expect(status.state).toBe("CANCELLED");
    expect(status.progress.message).toBe("cancelled");
  });

  it("reports an empty listing", async () => {
    const result = await callOk("list_my_jobs", { state: "TIMED_OUT" });
    expect(zListJobsOutput.parse(result.structuredContent)).toEqual({ count: 0, jobs: [] });
    expect(textOf(result)).toBe("No jobs found.");
  });
});
