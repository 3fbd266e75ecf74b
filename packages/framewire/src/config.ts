/**
 * Default tuning shared by the packetizer, reassembler and binder.
 */

export interface FramewireConfig {
  /** Largest unit accepted on either side, in bytes */
  maxUnitSize: number;
  /** Frame packets the outbound queue holds before new frames are dropped */
  maxQueuedFrames: number;
  /** Attempts for a frame packet that has not had any byte accepted yet */
  maxFrameWriteAttempts: number;
  /** Attempts for a configuration packet, or a packet already partly written */
  maxConfigWriteAttempts: number;
  /** Wait between write attempts, in ms */
  writeRetryDelayMs: number;
  /** Re-send the current configuration before every keyframe */
  refreshConfigOnKeyframe: boolean;
}

export const DEFAULT_CONFIG: Readonly<FramewireConfig> = Object.freeze({
  maxUnitSize: 16 * 1024 * 1024,
  maxQueuedFrames: 30,
  maxFrameWriteAttempts: 3,
  maxConfigWriteAttempts: 50,
  writeRetryDelayMs: 5,
  refreshConfigOnKeyframe: true,
});
