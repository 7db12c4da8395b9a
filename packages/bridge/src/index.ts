export { createBridge, BridgeInstance } from './bridge';
export type { CreateBridgeOptions } from './bridge';
export { CAPABILITY_CONTRACTS } from './contracts';
export { CapabilityRegistry, buildRegistry } from './registry';
export type { ContractSummary, PreparedCall, RegistryEntry } from './registry';
export { CallDispatcher } from './callDispatcher';
export type { CallDispatcherOptions } from './callDispatcher';
export { PermissionGate } from './permissionGate';
export { createPermissionStore, nextPermissionState, permissionStore } from './permissionStore';
export type { PermissionStore, PermissionStoreState, RequestOptions } from './permissionStore';
export { SubscriptionManager } from './subscriptionManager';
export type { SubscriptionEndReason, SubscriptionHandlers, SubscriptionManagerOptions } from './subscriptionManager';
export { renderFacadeScript } from './facade';
export type { FacadeOptions } from './facade';
