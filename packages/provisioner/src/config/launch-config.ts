/**
 * Launch configuration file.
 *
 * A JSON document describing what to launch, how long to wait for it and how
 * to configure it on first boot. Command-line flags are merged on top of the
 * file before validation, so both go through the same schema.
 */

import fs from "fs-extra";
import { z } from "zod";
import type {
  InstanceRequest,
  PersistentVolumeAttachment,
} from "@ephemera/adapters-common";
import {
  DEFAULT_CAPACITY_TYPE,
  DEFAULT_GUEST_SHELL,
  DEFAULT_PACKAGE_MANAGER,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_REGION,
  DEFAULT_SSH_CONNECT_TIMEOUT_SECONDS,
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_USER,
  DEFAULT_VOLUME_DEVICE_PATH,
  DEFAULT_VOLUME_FILESYSTEM,
} from "../constants";
import { resolveWaitPolicy, type WaitPolicy } from "../readiness/wait-policy";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.name = "ConfigError";
  }
}

// Values interpolated into remote shell commands are restricted to safe characters.
const packageNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9.+_:=~-]*$/, "Package names may not contain shell metacharacters");
const sysctlKeySchema = z.string().regex(/^[a-z0-9_.\/-]+$/, "Invalid sysctl key");
const absolutePathSchema = z
  .string()
  .regex(/^\/[A-Za-z0-9._\/-]*$/, "Must be an absolute path without spaces or shell metacharacters");

export const LaunchTemplateSchema = z
  .object({
    id: z.string().regex(/^lt-[0-9a-f]+$/, "Launch template IDs look like lt-0123abcd").optional(),
    name: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
  })
  .refine((template) => template.id !== undefined || template.name !== undefined, {
    message: "Launch template needs an id or a name",
  });

export const VolumeConfigSchema = z.object({
  volumeId: z.string().regex(/^vol-[0-9a-f]+$/, "Volume IDs look like vol-0123abcd"),
  devicePath: absolutePathSchema.default(DEFAULT_VOLUME_DEVICE_PATH),
  mountPoint: absolutePathSchema.optional(),
  filesystem: z.enum(["ext4", "xfs"]).default(DEFAULT_VOLUME_FILESYSTEM),
});

export const WaitConfigSchema = z.object({
  pollIntervalSeconds: z.number().positive().default(DEFAULT_POLL_INTERVAL_MS / 1000),
  timeoutSeconds: z.number().positive().optional(),
  maxAttempts: z.number().int().positive().optional(),
});

export const SshConfigSchema = z.object({
  user: z.string().min(1).default(DEFAULT_SSH_USER),
  port: z.number().int().min(1).max(65535).default(DEFAULT_SSH_PORT),
  identityFile: z.string().min(1).optional(),
  connectTimeoutSeconds: z.number().int().positive().default(DEFAULT_SSH_CONNECT_TIMEOUT_SECONDS),
});

export const BootstrapConfigSchema = z.object({
  username: z
    .string()
    .regex(/^[a-z_][a-z0-9_-]{0,31}$/, "Usernames must be lowercase, start with a letter or underscore")
    .optional(),
  shell: absolutePathSchema.default(DEFAULT_GUEST_SHELL),
  packages: z.array(packageNameSchema).default([]),
  packageManager: z.enum(["apt", "dnf"]).default(DEFAULT_PACKAGE_MANAGER),
  dotfilesDir: z.string().min(1).optional(),
  sysctl: z
    .record(sysctlKeySchema, z.union([z.number(), z.string().regex(/^[A-Za-z0-9 ._:\/-]*$/)]))
    .default({}),
  timezone: z
    .string()
    .regex(/^[A-Za-z0-9_+\/-]+$/, "Timezones look like Europe/Berlin")
    .optional(),
});

export const CredentialsSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  sessionToken: z.string().min(1).optional(),
});

/** The launch source is checked by toInstanceRequest; `configure` runs without one. */
export const LaunchConfigSchema = z.object({
  region: z.string().min(1).default(DEFAULT_REGION),
  credentials: CredentialsSchema.optional(),
  launchTemplate: LaunchTemplateSchema.optional(),
  overrides: z
    .object({
      instanceType: z.string().min(1).optional(),
      subnetId: z.string().min(1).optional(),
      availabilityZone: z.string().min(1).optional(),
    })
    .default({}),
  capacityType: z.enum(["on-demand", "spot"]).default(DEFAULT_CAPACITY_TYPE),
  tags: z.record(z.string()).default({}),
  instanceId: z.string().regex(/^i-[0-9a-f]+$/, "Instance IDs look like i-0123abcd").optional(),
  volume: VolumeConfigSchema.optional(),
  wait: WaitConfigSchema.default({}),
  ssh: SshConfigSchema.default({}),
  bootstrap: BootstrapConfigSchema.default({}),
});

export type LaunchConfig = z.infer<typeof LaunchConfigSchema>;
export type VolumeConfig = z.infer<typeof VolumeConfigSchema>;
export type SshConfig = z.infer<typeof SshConfigSchema>;
export type BootstrapConfig = z.infer<typeof BootstrapConfigSchema>;

/** Command-line values that take precedence over the file */
export interface LaunchConfigOverrides {
  region?: string;
  instanceId?: string;
  volumeId?: string;
  devicePath?: string;
  pollIntervalSeconds?: number;
  timeoutSeconds?: number;
  maxAttempts?: number;
}

/**
 * Validate raw configuration data.
 *
 * @param source - Shown in error messages (file path or "flags")
 */
export function parseLaunchConfig(raw: unknown, source = "launch config"): LaunchConfig {
  const result = LaunchConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${source}`,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Read, merge and validate a launch configuration.
 * Without a path the configuration comes from the overrides alone.
 */
export async function loadLaunchConfig(
  configPath: string | undefined,
  overrides: LaunchConfigOverrides = {},
): Promise<LaunchConfig> {
  let raw: Record<string, unknown> = {};

  if (configPath) {
    if (!(await fs.pathExists(configPath))) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    let data: unknown;
    try {
      data = await fs.readJson(configPath);
    } catch (error) {
      throw new ConfigError(
        `Could not parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    if (!isRecord(data)) {
      throw new ConfigError(`${configPath} must contain a JSON object`);
    }
    raw = data;
  }

  return parseLaunchConfig(applyOverrides(raw, overrides), configPath ?? "command-line options");
}

export function applyOverrides(
  raw: Record<string, unknown>,
  overrides: LaunchConfigOverrides,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  if (overrides.region !== undefined) merged.region = overrides.region;
  if (overrides.instanceId !== undefined) merged.instanceId = overrides.instanceId;

  if (overrides.volumeId !== undefined || overrides.devicePath !== undefined) {
    merged.volume = withDefined(raw.volume, {
      volumeId: overrides.volumeId,
      devicePath: overrides.devicePath,
    });
  }

  const { pollIntervalSeconds, timeoutSeconds, maxAttempts } = overrides;
  if (pollIntervalSeconds !== undefined || timeoutSeconds !== undefined || maxAttempts !== undefined) {
    merged.wait = withDefined(raw.wait, { pollIntervalSeconds, timeoutSeconds, maxAttempts });
  }

  return merged;
}

// ── Conversions ──────────────────────────────────────────────────────────

/**
 * An instance ID (from the file or --instance-id) wins over a launch template.
 */
export function toInstanceRequest(config: LaunchConfig): InstanceRequest {
  if (config.instanceId !== undefined) {
    return { kind: "existing", instanceId: config.instanceId };
  }
  if (config.launchTemplate === undefined) {
    throw new ConfigError("Either launchTemplate or instanceId is required");
  }
  return {
    kind: "launch-template",
    launchTemplate: config.launchTemplate,
    overrides: config.overrides,
    capacityType: config.capacityType,
    tags: config.tags,
  };
}

/** Sub-millisecond values round up to 1 ms. */
export function toWaitPolicy(config: LaunchConfig): WaitPolicy {
  const { pollIntervalSeconds, timeoutSeconds, maxAttempts } = config.wait;
  return resolveWaitPolicy({
    pollIntervalMs: secondsToMs(pollIntervalSeconds),
    timeoutMs: timeoutSeconds === undefined ? undefined : secondsToMs(timeoutSeconds),
    maxAttempts,
  });
}

export function toVolumeAttachment(config: LaunchConfig): PersistentVolumeAttachment | undefined {
  if (!config.volume) return undefined;
  return { volumeId: config.volume.volumeId, devicePath: config.volume.devicePath };
}

// ── Private Helpers ──────────────────────────────────────────────────────

function secondsToMs(seconds: number): number {
  return Math.max(1, Math.round(seconds * 1000));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function withDefined(base: unknown, values: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = isRecord(base) ? { ...base } : {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}
