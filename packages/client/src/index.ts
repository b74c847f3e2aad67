export {
  BridgeClient,
  reconnectDelay,
  type BridgeClientOptions,
  type ConnectionState,
  type TopicCallback,
} from './bridge-client.js';
