// Device link types
export {
  DeviceMessage,
  LinkState,
  LinkStatus,
  LinkDetails,
  DEVICE_SOURCE,
} from './device.js';

// Message types
export {
  ClientPayload,
  WSClientMessageType,
  WSClientMessageHeader,
  WSClientMessage,
  type WSClientMessageInput,
  WSServerMessageType,
  WSServerMessage,
  type WSServerMessageOf,
} from './message.js';

// HTTP types
export {
  PublishBody,
  PublishResult,
  HttpErrorBody,
  BridgeStatus,
} from './http.js';
