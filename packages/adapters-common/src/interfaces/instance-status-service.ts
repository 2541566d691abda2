import type {
  InstanceDetails,
  InstanceHandle,
  InstanceStatusSnapshot,
} from "../types/instance";

/**
 * Reads instance state and health from a cloud provider.
 */
export interface IInstanceStatusService {
  /**
   * Fetch a fresh status snapshot covering lifecycle, system and instance axes.
   *
   * @throws TransientQueryError on network/throttling issues (retryable)
   * @throws NotFoundError if the provider does not know the handle
   */
  describeInstanceStatus(handle: InstanceHandle): Promise<InstanceStatusSnapshot>;

  /**
   * Fetch addressing and sizing details for an instance.
   *
   * @throws TransientQueryError on network/throttling issues (retryable)
   * @throws NotFoundError if the provider does not know the handle
   */
  describeInstance(handle: InstanceHandle): Promise<InstanceDetails>;
}
