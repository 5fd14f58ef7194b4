#!/usr/bin/env node
import { readFile } from "fs/promises";
import type { PollResult } from "../application/jobs/JobResolver";
import { createJobsClient, type JobsClient } from "../composition/root";
import { ControlPlaneError, JobFailedError, PollTimeoutError, TransportError } from "../core/errors";
import type { Job } from "../core/jobs/Job";

const usage = [
  "Usage: cp-jobs <command>",
  "  get <job-guid>                              print the current state of a job",
  "  wait <job-guid> [job-guid...]               poll jobs until they finish",
  "  apply-manifest <space-guid> <file> [--wait] apply a manifest, optionally waiting for its job"
].join("\n");

type JobSummary = {
  guid: string;
  operation: string;
  state: string;
  errors: string[];
};

type CliErrorEnvelope = {
  event: "jobs.failed";
  name: string;
  message: string;
  code?: string;
  status?: number;
  job?: JobSummary;
  stack?: string;
};

const summarizeJob = (job: Job): JobSummary => ({
  guid: job.guid,
  operation: job.operation,
  state: job.state,
  errors: job.errors.map((err) => err.detail)
});

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));

  const envelope: CliErrorEnvelope = {
    event: "jobs.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (err instanceof ControlPlaneError) {
    envelope.code = err.code;
  }
  if (err instanceof TransportError && err.status !== undefined) {
    envelope.status = err.status;
  }

  const job = err instanceof JobFailedError || err instanceof PollTimeoutError ? err.job : undefined;
  if (job) {
    envelope.job = summarizeJob(job);
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const printResult = (result: PollResult) => {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({
    event: "job.resolved",
    outcome: result.outcome,
    job: result.job
  }));
};

const waitForJobs = async (client: JobsClient, jobIds: string[]): Promise<void> => {
  if (jobIds.length === 1) {
    const result = await client.jobs.resolve(jobIds[0] ?? "");
    printResult(result);
    if (result.outcome !== "complete") throw result.error;
    return;
  }

  const entries = await client.jobs.resolveAll(jobIds);
  let firstFailure: unknown;
  for (const entry of entries) {
    if (entry.status === "settled") {
      printResult(entry.result);
      if (entry.result.outcome !== "complete" && firstFailure === undefined) firstFailure = entry.result.error;
    } else if (firstFailure === undefined) {
      firstFailure = entry.error;
    }
  }
  if (firstFailure !== undefined) throw firstFailure;
};

export const runJobsCli = async (argv: string[], client?: JobsClient): Promise<void> => {
  const [command, ...rest] = argv;
  const wait = command === "apply-manifest" && rest.includes("--wait");
  const args = wait ? rest.filter((arg) => arg !== "--wait") : rest;
  if (args.includes("--wait")) throw new Error(usage);

  switch (command) {
    case "get": {
      if (args.length !== 1) throw new Error(usage);
      const job = await (client ?? createJobsClient()).jobs.fetch(args[0] ?? "");
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ event: "job.fetched", job }));
      return;
    }
    case "wait": {
      if (args.length === 0) throw new Error(usage);
      await waitForJobs(client ?? createJobsClient(), args);
      return;
    }
    case "apply-manifest": {
      const [spaceGuid, file] = args;
      if (spaceGuid === undefined || file === undefined || args.length !== 2) throw new Error(usage);
      const manifest = await readFile(file, "utf8");
      const resolvedClient = client ?? createJobsClient();
      const handle = await resolvedClient.operations.applyManifest(spaceGuid, manifest);
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ event: "manifest.accepted", jobId: handle.jobId }));
      if (wait) await waitForJobs(resolvedClient, [handle.jobId]);
      return;
    }
    default:
      throw new Error(usage);
  }
};

export const executeJobsCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    await runJobsCli(argv);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeJobsCli();
}
