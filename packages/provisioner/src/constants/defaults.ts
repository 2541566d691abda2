/**
 * Default values for launch and first-boot configuration.
 */

// Volume defaults
export const DEFAULT_VOLUME_DEVICE_PATH = "/dev/sdf";
export const DEFAULT_VOLUME_FILESYSTEM = "ext4";

// SSH defaults
export const DEFAULT_SSH_USER = "ubuntu";
export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_SSH_CONNECT_TIMEOUT_SECONDS = 10;

// Guest defaults
export const DEFAULT_GUEST_SHELL = "/bin/bash";
export const DEFAULT_PACKAGE_MANAGER = "apt";
export const SYSCTL_CONF_PATH = "/etc/sysctl.d/99-ephemera.conf";
export const DOTFILES_STAGING_DIR = "/tmp/ephemera-dotfiles";

// Fleet defaults
export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_CAPACITY_TYPE = "on-demand";
