import type { EC2Client } from "@aws-sdk/client-ec2";
import {
  AttachVolumeCommand,
  CreateFleetCommand,
  DescribeInstanceStatusCommand,
  DescribeInstancesCommand,
  DescribeVolumesCommand,
} from "@aws-sdk/client-ec2";
import {
  AttachError,
  NotFoundError,
  ProvisionError,
  TransientQueryError,
  type InstanceRequest,
} from "@ephemera/adapters-common";
import { EC2Service } from "./ec2-service";

type LaunchTemplateRequest = Extract<InstanceRequest, { kind: "launch-template" }>;

const makeRequest = (overrides?: Partial<LaunchTemplateRequest>): LaunchTemplateRequest => ({
  kind: "launch-template",
  launchTemplate: { id: "lt-0abc" },
  overrides: {},
  capacityType: "on-demand",
  tags: { "ephemera:managed": "true" },
  ...overrides,
});

function awsError(name: string, message = name): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe("EC2Service", () => {
  let mockSend: jest.Mock;
  let service: EC2Service;

  beforeEach(() => {
    mockSend = jest.fn();
    service = new EC2Service("us-east-1", undefined, { send: mockSend } as unknown as EC2Client);
  });

  describe("requestFleet", () => {
    it("returns the first instance ID from an instant fleet", async () => {
      mockSend.mockResolvedValueOnce({
        Instances: [{ InstanceIds: ["i-0123"] }],
      });

      const handle = await service.requestFleet(makeRequest());

      expect(handle).toEqual({ instanceId: "i-0123" });
      expect(mockSend).toHaveBeenCalledWith(expect.any(CreateFleetCommand));
    });

    it("sends template, capacity, overrides and tags", async () => {
      mockSend.mockResolvedValueOnce({ Instances: [{ InstanceIds: ["i-0123"] }] });

      await service.requestFleet(
        makeRequest({
          launchTemplate: { name: "dev-box", version: "4" },
          overrides: { instanceType: "t3.large", subnetId: "subnet-1" },
          capacityType: "spot",
        }),
      );

      const command = mockSend.mock.calls[0][0] as CreateFleetCommand;
      expect(command.input.Type).toBe("instant");
      expect(command.input.TargetCapacitySpecification).toEqual({
        TotalTargetCapacity: 1,
        DefaultTargetCapacityType: "spot",
      });
      expect(command.input.LaunchTemplateConfigs).toEqual([
        {
          LaunchTemplateSpecification: {
            LaunchTemplateId: undefined,
            LaunchTemplateName: "dev-box",
            Version: "4",
          },
          Overrides: [
            { InstanceType: "t3.large", SubnetId: "subnet-1", AvailabilityZone: undefined },
          ],
        },
      ]);
      expect(command.input.TagSpecifications).toEqual([
        { ResourceType: "instance", Tags: [{ Key: "ephemera:managed", Value: "true" }] },
      ]);
    });

    it("omits overrides when none are set", async () => {
      mockSend.mockResolvedValueOnce({ Instances: [{ InstanceIds: ["i-0123"] }] });

      await service.requestFleet(makeRequest());

      const command = mockSend.mock.calls[0][0] as CreateFleetCommand;
      expect(command.input.LaunchTemplateConfigs?.[0].Overrides).toBeUndefined();
      expect(command.input.LaunchTemplateConfigs?.[0].LaunchTemplateSpecification?.Version).toBe(
        "$Default",
      );
    });

    it("throws ProvisionError with the fleet error when no instance is created", async () => {
      mockSend.mockResolvedValueOnce({
        Instances: [],
        Errors: [{ ErrorCode: "InsufficientInstanceCapacity", ErrorMessage: "No capacity" }],
      });

      const error = await service.requestFleet(makeRequest()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProvisionError);
      expect((error as ProvisionError).message).toBe("No capacity");
      expect((error as ProvisionError).code).toBe("InsufficientInstanceCapacity");
    });

    it("wraps SDK rejections in ProvisionError", async () => {
      mockSend.mockRejectedValueOnce(awsError("InvalidLaunchTemplateId.NotFound", "bad template"));

      await expect(service.requestFleet(makeRequest())).rejects.toThrow(
        "Fleet request rejected: bad template",
      );
    });

    it("rejects a template reference with neither id nor name", async () => {
      await expect(
        service.requestFleet(makeRequest({ launchTemplate: {} })),
      ).rejects.toBeInstanceOf(ProvisionError);
      expect(mockSend).not.toHaveBeenCalled();
    });
  });

  describe("describeInstanceStatus", () => {
    it("classifies all three axes and keeps raw values", async () => {
      mockSend.mockResolvedValueOnce({
        InstanceStatuses: [
          {
            InstanceId: "i-0123",
            InstanceState: { Name: "running" },
            SystemStatus: { Status: "ok" },
            InstanceStatus: { Status: "initializing" },
          },
        ],
      });

      const snapshot = await service.describeInstanceStatus({ instanceId: "i-0123" });

      expect(mockSend).toHaveBeenCalledWith(expect.any(DescribeInstanceStatusCommand));
      expect(snapshot.lifecycleState).toBe("running");
      expect(snapshot.systemStatus).toBe("ok");
      expect(snapshot.instanceStatus).toBe("unknown");
      expect(snapshot.raw).toEqual({
        lifecycleState: "running",
        systemStatus: "ok",
        instanceStatus: "initializing",
      });
    });

    it("requests all instances, not just running ones", async () => {
      mockSend.mockResolvedValueOnce({ InstanceStatuses: [] });

      await service.describeInstanceStatus({ instanceId: "i-0123" });

      const command = mockSend.mock.calls[0][0] as DescribeInstanceStatusCommand;
      expect(command.input).toEqual({ InstanceIds: ["i-0123"], IncludeAllInstances: true });
    });

    it("returns an all-unknown snapshot when the provider reports nothing yet", async () => {
      mockSend.mockResolvedValueOnce({ InstanceStatuses: [] });

      const snapshot = await service.describeInstanceStatus({ instanceId: "i-0123" });

      expect(snapshot.lifecycleState).toBe("unknown");
      expect(snapshot.systemStatus).toBe("unknown");
      expect(snapshot.instanceStatus).toBe("unknown");
      expect(snapshot.raw).toEqual({
        lifecycleState: null,
        systemStatus: null,
        instanceStatus: null,
      });
    });

    it("maps throttling to TransientQueryError", async () => {
      mockSend.mockRejectedValueOnce(awsError("RequestLimitExceeded", "slow down"));

      const error = await service
        .describeInstanceStatus({ instanceId: "i-0123" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientQueryError);
      expect((error as TransientQueryError).operation).toBe("DescribeInstanceStatus");
    });

    it("maps socket errors to TransientQueryError", async () => {
      const socketError = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
      mockSend.mockRejectedValueOnce(socketError);

      await expect(
        service.describeInstanceStatus({ instanceId: "i-0123" }),
      ).rejects.toBeInstanceOf(TransientQueryError);
    });

    it("maps unknown instance IDs to NotFoundError", async () => {
      mockSend.mockRejectedValueOnce(awsError("InvalidInstanceID.NotFound"));

      const error = await service
        .describeInstanceStatus({ instanceId: "i-gone" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect((error as NotFoundError).resourceId).toBe("i-gone");
    });

    it("passes other provider errors through unchanged", async () => {
      const denied = awsError("UnauthorizedOperation", "denied");
      mockSend.mockRejectedValueOnce(denied);

      await expect(service.describeInstanceStatus({ instanceId: "i-0123" })).rejects.toBe(denied);
    });
  });

  describe("describeInstance", () => {
    it("returns addresses and instance type", async () => {
      mockSend.mockResolvedValueOnce({
        Reservations: [
          {
            Instances: [
              {
                InstanceId: "i-0123",
                InstanceType: "t3.small",
                PublicIpAddress: "203.0.113.10",
                PublicDnsName: "ec2-203-0-113-10.compute-1.amazonaws.com",
                PrivateIpAddress: "10.0.0.5",
                State: { Name: "running" },
              },
            ],
          },
        ],
      });

      const details = await service.describeInstance({ instanceId: "i-0123" });

      expect(mockSend).toHaveBeenCalledWith(expect.any(DescribeInstancesCommand));
      expect(details).toEqual({
        instanceId: "i-0123",
        instanceType: "t3.small",
        publicIpAddress: "203.0.113.10",
        publicDnsName: "ec2-203-0-113-10.compute-1.amazonaws.com",
        privateIpAddress: "10.0.0.5",
      });
    });

    it("treats an empty public DNS name as absent", async () => {
      mockSend.mockResolvedValueOnce({
        Reservations: [
          { Instances: [{ InstanceId: "i-0123", InstanceType: "t3.small", PublicDnsName: "" }] },
        ],
      });

      const details = await service.describeInstance({ instanceId: "i-0123" });

      expect(details.publicDnsName).toBeUndefined();
    });

    it("falls back to the requested ID and an unknown type", async () => {
      mockSend.mockResolvedValueOnce({
        Reservations: [{ Instances: [{ PrivateIpAddress: "10.0.0.9" }] }],
      });

      const details = await service.describeInstance({ instanceId: "i-0123" });

      expect(details).toEqual({
        instanceId: "i-0123",
        instanceType: "unknown",
        privateIpAddress: "10.0.0.9",
      });
    });

    it("throws NotFoundError when no reservation matches", async () => {
      mockSend.mockResolvedValueOnce({ Reservations: [] });

      await expect(service.describeInstance({ instanceId: "i-0123" })).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe("describeVolume", () => {
    it.each([
      ["available", "available"],
      ["in-use", "in-use"],
      ["creating", "unavailable"],
      ["error", "unavailable"],
      ["deleting", "missing"],
      ["deleted", "missing"],
    ])("maps volume state %s to %s", async (state, expected) => {
      mockSend.mockResolvedValueOnce({ Volumes: [{ VolumeId: "vol-1", State: state }] });

      await expect(service.describeVolume("vol-1")).resolves.toBe(expected);
      expect(mockSend).toHaveBeenCalledWith(expect.any(DescribeVolumesCommand));
    });

    it("returns missing when the provider does not know the volume", async () => {
      mockSend.mockRejectedValueOnce(awsError("InvalidVolume.NotFound"));

      await expect(service.describeVolume("vol-gone")).resolves.toBe("missing");
    });

    it("returns missing for an empty result", async () => {
      mockSend.mockResolvedValueOnce({ Volumes: [] });

      await expect(service.describeVolume("vol-1")).resolves.toBe("missing");
    });
  });

  describe("attachVolume", () => {
    it("sends the attach request", async () => {
      mockSend.mockResolvedValueOnce({});

      await service.attachVolume({ instanceId: "i-0123" }, "vol-1", "/dev/sdf");

      const command = mockSend.mock.calls[0][0] as AttachVolumeCommand;
      expect(command).toBeInstanceOf(AttachVolumeCommand);
      expect(command.input).toEqual({ InstanceId: "i-0123", VolumeId: "vol-1", Device: "/dev/sdf" });
    });

    it("wraps failures in AttachError", async () => {
      mockSend.mockRejectedValueOnce(awsError("VolumeInUse", "already attached"));

      const error = await service
        .attachVolume({ instanceId: "i-0123" }, "vol-1", "/dev/sdf")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AttachError);
      expect((error as AttachError).message).toBe(
        "Failed to attach vol-1 to i-0123 at /dev/sdf: already attached",
      );
    });
  });
});
