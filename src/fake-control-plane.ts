import http from "http";
import { URL } from "url";
import type { ApiError, JobWarning } from "./core/jobs/Job";

/**
 * Minimal fake control plane for end-to-end runs.
 * - GET /v3/jobs/:guid advances a scripted job by one read
 * - POST /v3/spaces/:guid/actions/apply_manifest answers 202 + Location
 * - POST /v3/service_credential_bindings answers 201 for keys, 202 for app bindings
 * - DELETE /v3/service_brokers/:guid answers 202 + Location
 */
export type FakeJobScript = {
  operation: string;
  processingReads: number;
  finalState: "COMPLETE" | "FAILED";
  errors?: ApiError[];
  warnings?: JobWarning[];
};

export type FakeControlPlane = {
  server: http.Server;
  addJob: (guid: string, script: FakeJobScript) => void;
  reads: (guid: string) => number;
  requests: Array<{ method: string; path: string }>;
};

export type FakeControlPlaneOptions = {
  manifestJob?: Omit<FakeJobScript, "operation">;
};

const defaultManifestJob: Omit<FakeJobScript, "operation"> = {
  processingReads: 2,
  finalState: "COMPLETE",
  warnings: [{ detail: "Manifest applied successfully" }]
};

const sendJson = (res: http.ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}) => {
  res.writeHead(status, { "content-type": "application/json", ...headers });
  res.end(JSON.stringify(body));
};

const notFound = (res: http.ServerResponse, detail: string) =>
  sendJson(res, 404, { errors: [{ code: 10010, title: "CF-ResourceNotFound", detail }] });

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });

export const createFakeControlPlane = (options: FakeControlPlaneOptions = {}): FakeControlPlane => {
  const jobs = new Map<string, { script: FakeJobScript; reads: number }>();
  const requests: FakeControlPlane["requests"] = [];
  let sequence = 0;

  const addJob = (guid: string, script: FakeJobScript) => {
    jobs.set(guid, { script, reads: 0 });
  };

  const acceptAsJob = (res: http.ServerResponse, prefix: string, script: FakeJobScript) => {
    sequence += 1;
    const guid = `${prefix}-${sequence}`;
    addJob(guid, script);
    res.writeHead(202, { location: `/v3/jobs/${guid}` });
    res.end();
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    requests.push({ method, path: url.pathname });

    const jobMatch = /^\/v3\/jobs\/([^/]+)$/.exec(url.pathname);
    if (method === "GET" && jobMatch?.[1]) {
      const guid = decodeURIComponent(jobMatch[1]);
      const entry = jobs.get(guid);
      if (!entry) return notFound(res, `Job ${guid} not found`);

      entry.reads += 1;
      const { script } = entry;
      const done = entry.reads > script.processingReads;
      const state = done ? script.finalState : "PROCESSING";
      return sendJson(res, 200, {
        guid,
        operation: script.operation,
        state,
        errors: state === "FAILED" ? script.errors ?? [] : [],
        warnings: done ? script.warnings ?? [] : [],
        links: { self: { href: `/v3/jobs/${guid}` } }
      });
    }

    if (method === "POST" && /^\/v3\/spaces\/[^/]+\/actions\/apply_manifest$/.test(url.pathname)) {
      await readBody(req);
      return acceptAsJob(res, "apply-manifest", {
        operation: "app.apply_manifest",
        ...(options.manifestJob ?? defaultManifestJob)
      });
    }

    if (method === "POST" && url.pathname === "/v3/service_credential_bindings") {
      const payload: unknown = JSON.parse(await readBody(req));
      const request = typeof payload === "object" && payload !== null ? payload : {};
      const type = "type" in request ? request.type : undefined;
      const name = "name" in request ? request.name : undefined;
      if (type === "key") {
        sequence += 1;
        return sendJson(res, 201, { guid: `binding-${sequence}`, type: "key", name: name ?? null });
      }
      return acceptAsJob(res, "binding-create", {
        operation: "service_credential_binding.create",
        processingReads: 1,
        finalState: "COMPLETE"
      });
    }

    if (method === "DELETE" && /^\/v3\/service_brokers\/[^/]+$/.test(url.pathname)) {
      return acceptAsJob(res, "broker-delete", {
        operation: "service_broker.delete",
        processingReads: 1,
        finalState: "COMPLETE"
      });
    }

    return notFound(res, `Unknown route ${method} ${url.pathname}`);
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      sendJson(res, 500, {
        errors: [{ code: 10001, title: "CF-ServerError", detail: err instanceof Error ? err.message : String(err) }]
      });
    });
  });

  return {
    server,
    addJob,
    reads: (guid) => jobs.get(guid)?.reads ?? 0,
    requests
  };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_CONTROL_PLANE_PORT ?? 3999);
  const fake = createFakeControlPlane();
  fake.addJob("demo-job", {
    operation: "service_broker.delete",
    processingReads: 3,
    finalState: "FAILED",
    errors: [{ code: 270010, title: "CF-ServiceBrokerNotRemovable", detail: "broker has instances" }]
  });

  fake.server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake control plane on http://localhost:${port}`);
  });
}
