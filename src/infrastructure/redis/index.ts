export { default as redisPlugin } from './redis-plugin.js';
export { enqueueInput } from './input-producer.js';
export { RedisStreamSource, INPUT_STREAM_KEY, parseReadReply, parseInputFields } from './input-stream-source.js';
export type { RedisStreamSourceOptions } from './input-stream-source.js';
export { startBusAuditForwarder, BUS_AUDIT_CHANNEL } from './bus-audit-forwarder.js';
export { startCollaboratorBridge, BRIDGE_SUBSCRIBER_ID } from './collaborator-bridge.js';
export type { CollaboratorBridge, CollaboratorBridgeOptions } from './collaborator-bridge.js';
