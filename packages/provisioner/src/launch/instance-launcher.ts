/**
 * Instance Launcher
 *
 * Requests one instance (or adopts an existing one) and hands it to the
 * readiness poller.
 */

import {
  sanitizeTagValue,
  type IFleetService,
  type InstanceHandle,
  type InstanceRequest,
  type ReadyInstance,
} from "@ephemera/adapters-common";
import { BaseOperation, type LogCallback, type OperationRuntime } from "../base/base-operation";
import { LABEL_PREFIX, MANAGED_VALUE, RESOURCE_LABELS } from "../constants";
import { PollCancelledError } from "../readiness/readiness-errors";
import type { ReadinessPoller } from "../readiness/readiness-poller";

export type LaunchStep = "request" | "readiness";

export type ProgressCallback = (
  step: LaunchStep,
  status: "in_progress" | "complete" | "error",
  message?: string,
) => void;

export interface LaunchOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

export interface InstanceLauncherOptions extends OperationRuntime {
  fleetService: IFleetService;
  poller: ReadinessPoller;
}

const TOTAL_STEPS = 2;

export class InstanceLauncher extends BaseOperation {
  private readonly fleetService: IFleetService;
  private readonly poller: ReadinessPoller;

  constructor(options: InstanceLauncherOptions) {
    super(options);
    this.fleetService = options.fleetService;
    this.poller = options.poller;
  }

  override setLogCallback(cb: LogCallback): void {
    super.setLogCallback(cb);
    this.poller.setLogCallback(cb);
  }

  async launch(request: InstanceRequest, options: LaunchOptions = {}): Promise<ReadyInstance> {
    const { signal, onProgress } = options;

    if (signal?.aborted) {
      throw new PollCancelledError({ axis: "input" });
    }

    onProgress?.("request", "in_progress", "Requesting instance...");
    let handle: InstanceHandle;
    try {
      handle = await this.resolveHandle(request);
    } catch (error) {
      onProgress?.("request", "error", error instanceof Error ? error.message : String(error));
      throw error;
    }
    onProgress?.("request", "complete", `Instance ${handle.instanceId}`);

    this.log(`[2/${TOTAL_STEPS}] Waiting for ${handle.instanceId} to become ready...`);
    onProgress?.("readiness", "in_progress", `Waiting for ${handle.instanceId}...`);
    try {
      const ready = await this.poller.waitUntilReady(handle, {
        signal,
        recentlyCreated: request.kind === "launch-template",
      });
      onProgress?.("readiness", "complete", `Instance ${ready.instanceId} is ready`);
      return ready;
    } catch (error) {
      onProgress?.("readiness", "error", error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  /**
   * Tags applied to every requested instance.
   * Caller tags win, except for the managed marker.
   */
  buildTags(request: Extract<InstanceRequest, { kind: "launch-template" }>): Record<string, string> {
    const template = request.launchTemplate.name ?? request.launchTemplate.id ?? "instance";
    return {
      [RESOURCE_LABELS.NAME]: sanitizeTagValue(`${LABEL_PREFIX}-${template}`),
      [RESOURCE_LABELS.LAUNCHED_AT]: new Date(this.now()).toISOString(),
      ...request.tags,
      [RESOURCE_LABELS.MANAGED]: MANAGED_VALUE,
    };
  }

  private async resolveHandle(request: InstanceRequest): Promise<InstanceHandle> {
    if (request.kind === "existing") {
      this.log(`[1/${TOTAL_STEPS}] Using existing instance ${request.instanceId}`);
      return { instanceId: request.instanceId };
    }

    const template = request.launchTemplate.id ?? request.launchTemplate.name ?? "(unset)";
    this.log(`[1/${TOTAL_STEPS}] Requesting ${request.capacityType} instance from ${template}...`);

    const handle = await this.fleetService.requestFleet({
      ...request,
      tags: this.buildTags(request),
    });

    this.logFields("launch", {
      event: "requested",
      instanceId: handle.instanceId,
      capacityType: request.capacityType,
      instanceType: request.overrides.instanceType,
    });
    return handle;
  }
}
