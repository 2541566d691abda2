/**
 * Remote command execution and file copy against a single host.
 * Implemented over SSH/SCP by the provisioner package.
 */
export interface IRemoteShell {
  /** Host this shell talks to */
  readonly host: string;

  /**
   * Run a shell command on the host.
   *
   * @returns Trimmed standard output
   * @throws RemoteCommandError on non-zero exit
   */
  run(command: string): Promise<string>;

  /**
   * Copy a local file to a path on the host.
   *
   * @throws RemoteCommandError when the copy fails
   */
  copy(localPath: string, remotePath: string): Promise<void>;
}
