import { ValueTransfer } from "@rpswager/core";

/**
 * What the core needs from the environment that runs it.
 *
 * The host serializes calls, moves attached value into custody before the
 * call runs, and hands it back if the call throws.
 */
export interface HostEnvironment {
  /** Current block height; monotonic. */
  blockNumber(): bigint;

  /**
   * Send value out of custody. Applies every transfer in the batch or none;
   * throws (usually a TransferRejectedError) to refuse.
   */
  transfer(batch: ValueTransfer[]): void;
}
