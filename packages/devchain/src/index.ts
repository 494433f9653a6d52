export { LocalChain } from "./LocalChain";
export type { LocalChainOptions, TransferReceipt } from "./LocalChain";
export { createPlayer, randomBlindingFactor } from "./players";
export type { TestPlayer } from "./players";
