export { createHealthRouter, buildHealth, buildServiceInfo, SERVICE_NAME } from './health';
export { createIngestRouter, createIngestHandler, parseIngestRequest } from './ingest';
export { createChatRouter, createChatHandler, parseChatRequest, DEFAULT_ASSISTANT_INFO } from './chat';
export { handleRouteError } from './errors';
export type { JsonRequest, JsonResponse } from './errors';
