export * from "./types/game";
export * from "./types/events";
export * from "./types/snapshot";
export * from "./errors";
export * from "./libs/Encoding";
export * from "./libs/Crypto";

// Database layer
export * from "./database";

// Validation
export {
  isEvmAddress,
  normalizeAddress,
  isBytes32,
  isUint256,
  parseUint256,
  MAX_UINT256,
} from "./validation";
