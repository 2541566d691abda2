import type { InstanceHandle, InstanceRequest } from "../types/instance";

/**
 * Requests compute capacity from a cloud provider.
 * Implemented by the AWS EC2Service (CreateFleet).
 */
export interface IFleetService {
  /**
   * Request a single instance from a launch template.
   *
   * @returns Handle of the instance the provider created
   * @throws ProvisionError when the provider rejects the request (quota, invalid template, ...)
   */
  requestFleet(
    request: Extract<InstanceRequest, { kind: "launch-template" }>
  ): Promise<InstanceHandle>;
}
