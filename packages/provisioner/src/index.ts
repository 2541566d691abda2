// Base
export {
  BaseOperation,
  OperationCancelledError,
  abortableSleep,
  type LogCallback,
  type SleepFn,
  type OperationRuntime,
  type RetryOptions,
} from "./base/base-operation";

// Readiness
export { ReadinessPoller } from "./readiness/readiness-poller";
export type { ReadinessPollerOptions, WaitUntilReadyOptions } from "./readiness/readiness-poller";
export {
  ReadinessState,
  STATE_ORDER,
  evaluateSnapshot,
  type PollingState,
  type StatusAxis,
  type SnapshotDecision,
} from "./readiness/readiness-state";
export {
  ReadinessError,
  PreconditionError,
  LifecycleRegressionError,
  ReadinessTimeoutError,
  QueryFailedError,
  PollCancelledError,
  type ReadinessErrorKind,
  type ReadinessErrorContext,
} from "./readiness/readiness-errors";
export {
  WaitPolicySchema,
  resolveWaitPolicy,
  describeWaitPolicy,
  type WaitPolicy,
  type WaitPolicyInput,
} from "./readiness/wait-policy";

// Volume
export { VolumeAttacher, type QueryRetryPolicy } from "./volume/volume-attacher";

// Launch
export {
  InstanceLauncher,
  type InstanceLauncherOptions,
  type LaunchOptions,
  type LaunchStep,
  type ProgressCallback,
} from "./launch/instance-launcher";

// Config
export {
  ConfigError,
  LaunchConfigSchema,
  parseLaunchConfig,
  loadLaunchConfig,
  applyOverrides,
  toInstanceRequest,
  toWaitPolicy,
  toVolumeAttachment,
  type LaunchConfig,
  type LaunchConfigOverrides,
  type VolumeConfig,
  type SshConfig,
  type BootstrapConfig,
} from "./config/launch-config";

// Remote configuration
export {
  SshRemoteShell,
  RemoteCommandError,
  shellQuote,
  type SshRemoteShellOptions,
} from "./remote/ssh-remote-shell";
export {
  FirstBootConfigurator,
  type ConfigureResult,
  type ConfigureStep,
  type ConfigureTarget,
  type FirstBootConfiguratorOptions,
  type StepOutcome,
} from "./configure/first-boot-configurator";

// Credential agent
export {
  CredentialAgentManager,
  AgentError,
  type AgentStatus,
  type AgentStatusReport,
  type AgentStartResult,
  type AgentEnvironment,
} from "./agent/credential-agent";

// Utilities
export { runCommand, CommandFailedError, type CommandRunner, type CommandResult } from "./utils/run-command";
export { formatFields, type FieldValue } from "./utils/format-fields";

// Constants
export * from "./constants";
