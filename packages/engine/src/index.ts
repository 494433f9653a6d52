export { RpsGame } from "./RpsGame";
export type {
  InitializeParams,
  RpsGameOptions,
  OperationResult,
  Transaction,
  GameStatus,
  PlayerStatus,
} from "./RpsGame";
export { AdminControl, operatorList } from "./AdminControl";
export type { OperatorCheck } from "./AdminControl";
export { EscrowLedger } from "./EscrowLedger";
export { resolve, settle } from "./resolution";
export { verifyCommitment } from "./verifier";
export { parseChoice, isPlayable } from "./choice";
export type { PlayableChoice } from "./choice";
export {
  cloneState,
  toSnapshot,
  fromSnapshot,
  serializeState,
  deserializeState,
} from "./snapshot";
export type { HostEnvironment } from "./interfaces/IHost";
