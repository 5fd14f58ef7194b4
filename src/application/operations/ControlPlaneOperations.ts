import { z } from "zod";
import { MalformedAsyncResponseError } from "../../core/errors";
import type { JobHandle, Outcome } from "../../core/outcome/Outcome";
import {
  classifyResponse,
  noContent,
  schemaDecoder,
  type ResourceDecoder
} from "../../core/outcome/classifyResponse";
import { wrapTransportFailure } from "../../core/responseError";
import type { Transport, TransportRequest, TransportResponse } from "../../ports/Transport";

export const ServiceCredentialBindingSchema = z
  .object({
    guid: z.string().min(1),
    type: z.enum(["app", "key"]),
    name: z.string().nullish()
  })
  .passthrough();

export type ServiceCredentialBinding = z.infer<typeof ServiceCredentialBindingSchema>;

export type CreateServiceCredentialBindingRequest = {
  type: "app" | "key";
  serviceInstanceGuid: string;
  name?: string;
  appGuid?: string;
  parameters?: Record<string, unknown>;
};

export type OperationOptions = {
  signal?: AbortSignal;
};

const requireValue = (value: string, message: string) => {
  if (value.trim() === "") throw new Error(message);
};

const relationship = (guid: string) => ({ data: { guid } });

/**
 * Mutating calls whose completion mode is only known once the response
 * arrives. Each returns an `Outcome` the caller has to branch on.
 */
export class ControlPlaneOperations {
  constructor(private readonly transport: Transport) {}

  /**
   * Always processed in the background: resolves to the job handle, and a
   * synchronous answer is treated as a contract violation.
   */
  async applyManifest(spaceGuid: string, manifestYaml: string, options: OperationOptions = {}): Promise<JobHandle> {
    requireValue(spaceGuid, "space GUID is required");
    requireValue(manifestYaml, "manifest content is required");

    const { outcome, response } = await this.submit(
      {
        method: "POST",
        path: `/v3/spaces/${encodeURIComponent(spaceGuid)}/actions/apply_manifest`,
        body: manifestYaml,
        headers: { "content-type": "application/x-yaml" },
        signal: options.signal
      },
      noContent
    );

    if (outcome.kind === "resolved") {
      throw new MalformedAsyncResponseError({
        status: response.status,
        reason: "apply_manifest must be accepted as a job"
      });
    }
    return outcome.job;
  }

  async deleteServiceBroker(guid: string, options: OperationOptions = {}): Promise<Outcome<undefined>> {
    requireValue(guid, "service broker GUID is required");

    const { outcome } = await this.submit(
      { method: "DELETE", path: `/v3/service_brokers/${encodeURIComponent(guid)}`, signal: options.signal },
      noContent
    );
    return outcome;
  }

  /**
   * Keys are usually created inline; app bindings usually come back as a job.
   * Either may happen for either type.
   */
  async createServiceCredentialBinding(
    request: CreateServiceCredentialBindingRequest,
    options: OperationOptions = {}
  ): Promise<Outcome<ServiceCredentialBinding>> {
    requireValue(request.serviceInstanceGuid, "service instance GUID is required");
    if (request.type === "app") {
      requireValue(request.appGuid ?? "", "app GUID is required for app bindings");
    }

    const relationships: Record<string, { data: { guid: string } }> = {
      service_instance: relationship(request.serviceInstanceGuid)
    };
    if (request.appGuid) relationships.app = relationship(request.appGuid);

    const { outcome } = await this.submit(
      {
        method: "POST",
        path: "/v3/service_credential_bindings",
        body: {
          type: request.type,
          name: request.name,
          relationships,
          parameters: request.parameters
        },
        signal: options.signal
      },
      schemaDecoder(ServiceCredentialBindingSchema, "service credential binding")
    );
    return outcome;
  }

  private async submit<T>(
    request: TransportRequest,
    decode: ResourceDecoder<T>
  ): Promise<{ outcome: Outcome<T>; response: TransportResponse }> {
    let response: TransportResponse;
    try {
      response = await this.transport.request(request);
    } catch (err) {
      throw wrapTransportFailure(err, request);
    }
    return { outcome: classifyResponse(response, decode, request), response };
  }
}
