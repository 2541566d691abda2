import type { InstanceHandle } from "../types/instance";
import type { VolumeAvailability } from "../types/volume";

/**
 * Block-storage volume operations.
 */
export interface IVolumeService {
  /**
   * Report whether a volume can be attached right now.
   * A volume the provider does not know resolves to "missing".
   */
  describeVolume(volumeId: string): Promise<VolumeAvailability>;

  /**
   * Attach a volume to an instance at the given device path.
   *
   * @throws AttachError when the provider refuses the attachment
   */
  attachVolume(handle: InstanceHandle, volumeId: string, devicePath: string): Promise<void>;
}
