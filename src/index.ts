// Main entry point for the service registry library

// Types
export * from './types';

// Errors and logging
export * from './common/errors';
export { RegistryLogger, createLogger, type LoggingConfig } from './common/logger';

// Instance stores
export { InMemoryInstanceStore } from './persistence/memory/InMemoryInstanceStore';
export { WriteAheadLogInstanceStore, type WriteAheadLogStoreOptions } from './persistence/WriteAheadLogInstanceStore';
export { InstanceStoreFactory, type InstanceStoreType, type InstanceStoreFactoryConfig } from './persistence/InstanceStoreFactory';
export type { WALConfig, WALEntry, InstanceUpdate } from './persistence/wal/types';

// Query and validation
export * from './registry/filter/InstanceFilter';
export { validateRegistration, validateInstanceKey } from './registry/validation';

// Fan-out
export { Subscriber } from './connections/Subscriber';
export { SubscriberHub } from './connections/SubscriberHub';
export * from './connections/types';

// Liveness
export * from './monitoring/LivenessSweeper';

// Orchestration
export * from './registry/ServiceRegistry';

// Transport
export { RegistryHttpServer, type RegistryHttpServerConfig } from './transport/RegistryHttpServer';
export { WatchChannel, type WatchChannelOptions } from './transport/WatchChannel';

// Configuration
export * from './config/RegistryConfiguration';

// Node
export { RegistryNode, type RegistryNodeOptions } from './common/RegistryNode';

// Client SDK
export { RegistryClient } from './client/RegistryClient';
export { RegistryWatcher, parseRegistryEvent } from './client/RegistryWatcher';
export { RegistryClientError } from './client/errors';
export * from './client/types';
