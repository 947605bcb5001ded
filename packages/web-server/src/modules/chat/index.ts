export { ChatModule } from './chat.module.js';
export { ChatGateway, AUTH_FAILED_CLOSE_CODE } from './chat.gateway.js';
export { parseClientMessage, tokenFromUrl, INVALID_JSON, type ClientMessage } from './chat-protocol.js';
