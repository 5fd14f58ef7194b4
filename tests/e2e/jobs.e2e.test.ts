import { JobResolver } from "../../src/application/jobs/JobResolver";
import { settleOutcome } from "../../src/application/jobs/settleOutcome";
import { ControlPlaneOperations } from "../../src/application/operations/ControlPlaneOperations";
import { JobFailedError, JobNotFoundError } from "../../src/core/errors";
import {
  createFakeControlPlane,
  type FakeControlPlane,
  type FakeControlPlaneOptions
} from "../../src/fake-control-plane";
import { FetchTransport } from "../../src/infrastructure/http/FetchTransport";

type Harness = {
  fake: FakeControlPlane;
  jobs: JobResolver;
  operations: ControlPlaneOperations;
  close: () => Promise<void>;
};

const startHarness = async (options: FakeControlPlaneOptions = {}): Promise<Harness> => {
  const fake = createFakeControlPlane(options);
  await new Promise<void>((resolve) => {
    fake.server.listen(0, "127.0.0.1", () => resolve());
  });
  const address = fake.server.address();
  if (address === null || typeof address === "string") throw new Error("fake control plane has no TCP address");

  const transport = new FetchTransport(`http://127.0.0.1:${address.port}`, { accessToken: "test-secret", timeoutMs: 2000 });
  return {
    fake,
    jobs: new JobResolver(transport, { pollIntervalMs: 10, pollTimeoutMs: 5000 }),
    operations: new ControlPlaneOperations(transport),
    close: () =>
      new Promise<void>((resolve, reject) => {
        fake.server.closeAllConnections();
        fake.server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

describe("jobs against the fake control plane (e2e)", () => {
  let harness: Harness;
  let fake: FakeControlPlane;
  let jobs: JobResolver;
  let operations: ControlPlaneOperations;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    harness = await startHarness();
    ({ fake, jobs, operations } = harness);
  });

  afterEach(async () => {
    warnSpy.mockRestore();
    await harness.close();
  });

  it("applies a manifest and waits for its job to complete", async () => {
    const handle = await operations.applyManifest("space-guid", "applications:\n- name: app\n");

    const result = await jobs.resolve(handle.jobId);

    expect(handle.jobId).toBe("apply-manifest-1");
    expect(result.outcome).toBe("complete");
    expect(result.job).toMatchObject({
      guid: "apply-manifest-1",
      operation: "app.apply_manifest",
      state: "COMPLETE",
      errors: [],
      warnings: [{ detail: "Manifest applied successfully" }]
    });
    expect(fake.reads(handle.jobId)).toBe(3);
  });

  it("reports a failed job with its errors", async () => {
    fake.addJob("doomed", {
      operation: "service_broker.delete",
      processingReads: 1,
      finalState: "FAILED",
      errors: [{ code: 270010, title: "CF-ServiceBrokerNotRemovable", detail: "broker has instances" }]
    });

    const error = await jobs.waitForJob("doomed").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(JobFailedError);
    expect(error).toMatchObject({ message: "job doomed (service_broker.delete) failed: broker has instances" });
    expect(fake.reads("doomed")).toBe(2);
  });

  it("raises JobNotFoundError for an unknown job", async () => {
    await expect(jobs.fetch("nope")).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it("settles a key binding inline and an app binding through its job", async () => {
    const key = await settleOutcome(
      await operations.createServiceCredentialBinding({ type: "key", serviceInstanceGuid: "instance", name: "my-key" }),
      jobs
    );
    const app = await settleOutcome(
      await operations.createServiceCredentialBinding({ type: "app", serviceInstanceGuid: "instance", appGuid: "app" }),
      jobs
    );

    expect(key).toEqual({ kind: "resolved", resource: { guid: "binding-1", type: "key", name: "my-key" } });
    expect(app).toMatchObject({
      kind: "job",
      result: { outcome: "complete", job: { guid: "binding-create-2", operation: "service_credential_binding.create" } }
    });
  });

  it("resolves several broker deletions together", async () => {
    const first = await operations.deleteServiceBroker("broker-a");
    const second = await operations.deleteServiceBroker("broker-b");
    if (first.kind !== "pending" || second.kind !== "pending") throw new Error("expected both deletions to be accepted as jobs");

    const entries = await jobs.resolveAll([first.job.jobId, second.job.jobId]);

    expect(entries).toEqual([
      expect.objectContaining({ jobId: "broker-delete-1", status: "settled" }),
      expect.objectContaining({ jobId: "broker-delete-2", status: "settled" })
    ]);
    expect(fake.requests.filter((request) => request.method === "DELETE").map((request) => request.path)).toEqual([
      "/v3/service_brokers/broker-a",
      "/v3/service_brokers/broker-b"
    ]);
  });
});

describe("a manifest job that fails on the fake control plane (e2e)", () => {
  let harness: Harness;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    harness = await startHarness({
      manifestJob: {
        processingReads: 1,
        finalState: "FAILED",
        errors: [
          { code: 10008, title: "CF-UnprocessableEntity", detail: "For application 'web': Routes cannot be mapped" },
          { code: 10008, title: "CF-UnprocessableEntity", detail: "For application 'worker': Memory quota exceeded" }
        ]
      }
    });
  });

  afterEach(async () => {
    warnSpy.mockRestore();
    await harness.close();
  });

  it("returns the failed job with every error numbered", async () => {
    const handle = await harness.operations.applyManifest("space-guid", "applications:\n- name: web\n");

    const result = await harness.jobs.resolve(handle.jobId);

    expect(result.outcome).toBe("failed");
    expect(result.job.state).toBe("FAILED");
    if (result.outcome !== "failed") return;
    expect(result.error.message).toBe(
      "job apply-manifest-1 (app.apply_manifest) failed: multiple errors:\n" +
        "  1. For application 'web': Routes cannot be mapped\n" +
        "  2. For application 'worker': Memory quota exceeded"
    );
    expect(harness.fake.reads(handle.jobId)).toBe(2);
  });
});
