import {
  EC2Client,
  CreateFleetCommand,
  DescribeInstanceStatusCommand,
  DescribeInstancesCommand,
  DescribeVolumesCommand,
  AttachVolumeCommand,
  Instance,
  Volume,
  FleetLaunchTemplateOverridesRequest,
  _InstanceType,
} from "@aws-sdk/client-ec2";
import {
  AttachError,
  NotFoundError,
  ProvisionError,
  classifyHealthStatus,
  classifyLifecycleState,
  type IFleetService,
  type IInstanceStatusService,
  type IVolumeService,
  type InstanceDetails,
  type InstanceHandle,
  type InstanceRequest,
  type InstanceStatusSnapshot,
  type VolumeAvailability,
} from "@ephemera/adapters-common";
import {
  awsErrorMessage,
  awsErrorName,
  isNotFoundError,
  toQueryError,
} from "../errors/aws-errors";

export interface EC2Credentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

type LaunchTemplateRequest = Extract<InstanceRequest, { kind: "launch-template" }>;

/**
 * EC2 implementation of the fleet, instance-status and volume collaborators.
 */
export class EC2Service implements IFleetService, IInstanceStatusService, IVolumeService {
  private client: EC2Client;

  constructor(region: string = "us-east-1", credentials?: EC2Credentials, client?: EC2Client) {
    this.client =
      client ??
      new EC2Client({
        region,
        credentials: credentials
          ? {
              accessKeyId: credentials.accessKeyId,
              secretAccessKey: credentials.secretAccessKey,
              sessionToken: credentials.sessionToken,
            }
          : undefined,
      });
  }

  /**
   * Request one instance through an instant fleet.
   */
  async requestFleet(request: LaunchTemplateRequest): Promise<InstanceHandle> {
    const { launchTemplate, overrides, capacityType, tags } = request;
    if (!launchTemplate.id && !launchTemplate.name) {
      throw new ProvisionError("Launch template requires an id or a name", "MissingLaunchTemplate");
    }

    const override: FleetLaunchTemplateOverridesRequest = {
      InstanceType: overrides.instanceType as _InstanceType | undefined,
      SubnetId: overrides.subnetId,
      AvailabilityZone: overrides.availabilityZone,
    };
    const hasOverride = Object.values(override).some((value) => value !== undefined);

    let result;
    try {
      result = await this.client.send(
        new CreateFleetCommand({
          Type: "instant",
          TargetCapacitySpecification: {
            TotalTargetCapacity: 1,
            DefaultTargetCapacityType: capacityType,
          },
          LaunchTemplateConfigs: [
            {
              LaunchTemplateSpecification: {
                LaunchTemplateId: launchTemplate.id,
                LaunchTemplateName: launchTemplate.id ? undefined : launchTemplate.name,
                Version: launchTemplate.version ?? "$Default",
              },
              Overrides: hasOverride ? [override] : undefined,
            },
          ],
          TagSpecifications: [
            {
              ResourceType: "instance",
              Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
            },
          ],
        })
      );
    } catch (error) {
      throw new ProvisionError(
        `Fleet request rejected: ${awsErrorMessage(error)}`,
        awsErrorName(error),
        { cause: error },
      );
    }

    const instanceId = (result.Instances ?? []).flatMap((i) => i.InstanceIds ?? [])[0];
    if (!instanceId) {
      const fleetError = result.Errors?.[0];
      throw new ProvisionError(
        fleetError?.ErrorMessage ?? "Fleet request returned no instances",
        fleetError?.ErrorCode,
      );
    }

    return { instanceId };
  }

  /**
   * Read lifecycle state plus system and instance health checks.
   * IncludeAllInstances makes non-running instances visible too.
   */
  async describeInstanceStatus(handle: InstanceHandle): Promise<InstanceStatusSnapshot> {
    const { instanceId } = handle;
    let result;
    try {
      result = await this.client.send(
        new DescribeInstanceStatusCommand({
          InstanceIds: [instanceId],
          IncludeAllInstances: true,
        })
      );
    } catch (error) {
      throw toQueryError(error, "DescribeInstanceStatus", instanceId);
    }

    const statuses = result.InstanceStatuses ?? [];
    const status = statuses.find((s) => s.InstanceId === instanceId) ?? statuses[0];
    const raw = {
      lifecycleState: status?.InstanceState?.Name ?? null,
      systemStatus: status?.SystemStatus?.Status ?? null,
      instanceStatus: status?.InstanceStatus?.Status ?? null,
    };

    return {
      lifecycleState: classifyLifecycleState(raw.lifecycleState),
      systemStatus: classifyHealthStatus(raw.systemStatus),
      instanceStatus: classifyHealthStatus(raw.instanceStatus),
      raw,
      observedAt: new Date(),
    };
  }

  /**
   * Addresses and type of one instance. An empty public DNS name
   * (no public interface) is reported as absent.
   */
  async describeInstance(handle: InstanceHandle): Promise<InstanceDetails> {
    const { instanceId } = handle;
    let result;
    try {
      result = await this.client.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] }));
    } catch (error) {
      throw toQueryError(error, "DescribeInstances", instanceId);
    }

    const instance = (result.Reservations ?? []).flatMap((r) => r.Instances ?? [])[0];
    if (!instance) {
      throw new NotFoundError(`Instance ${instanceId} not found`, instanceId);
    }
    return this.mapInstanceDetails(instanceId, instance);
  }

  async describeVolume(volumeId: string): Promise<VolumeAvailability> {
    let result;
    try {
      result = await this.client.send(new DescribeVolumesCommand({ VolumeIds: [volumeId] }));
    } catch (error) {
      if (isNotFoundError(error)) return "missing";
      throw toQueryError(error, "DescribeVolumes", volumeId);
    }

    const volume = result.Volumes?.[0];
    return volume ? this.mapVolumeAvailability(volume) : "missing";
  }

  async attachVolume(handle: InstanceHandle, volumeId: string, devicePath: string): Promise<void> {
    try {
      await this.client.send(
        new AttachVolumeCommand({
          InstanceId: handle.instanceId,
          VolumeId: volumeId,
          Device: devicePath,
        })
      );
    } catch (error) {
      throw new AttachError(
        `Failed to attach ${volumeId} to ${handle.instanceId} at ${devicePath}: ${awsErrorMessage(error)}`,
        volumeId,
        { cause: error },
      );
    }
  }

  private mapInstanceDetails(instanceId: string, instance: Instance): InstanceDetails {
    return {
      instanceId: instance.InstanceId ?? instanceId,
      instanceType: instance.InstanceType ?? "unknown",
      publicIpAddress: instance.PublicIpAddress,
      publicDnsName: instance.PublicDnsName || undefined,
      privateIpAddress: instance.PrivateIpAddress,
    };
  }

  private mapVolumeAvailability(volume: Volume): VolumeAvailability {
    switch (volume.State) {
      case "available":
        return "available";
      case "in-use":
        return "in-use";
      case "deleting":
      case "deleted":
        return "missing";
      default:
        return "unavailable";
    }
  }
}
