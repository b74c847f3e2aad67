export { ClientRegistry, type ClientConnection, type ClientSocket } from './connection-manager.js';
export { MessageHandler, type DevicePublisher } from './message-handler.js';
export { createWebSocketServer, CONNECTION_LIMIT_CLOSE_CODE, type WebSocketServerOptions } from './server.js';
