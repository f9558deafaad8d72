export { AuthoritativeBridge, type AuthoritativeBridgeOptions } from './AuthoritativeBridge.js';
export { acceptRole, assignRole, DEFAULT_HANDSHAKE_TIMEOUT_MS } from './handshake.js';
export { expectMessage, networkFaultFromClose } from './messages.js';
export { RelayBridge, type RelayBridgeOptions } from './RelayBridge.js';
