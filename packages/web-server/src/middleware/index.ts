export { RequestContextMiddleware, REQUEST_ID_HEADER, clientAddress } from './request-context.middleware.js';
export { AllowedHostsMiddleware, isHostAllowed } from './allowed-hosts.middleware.js';
