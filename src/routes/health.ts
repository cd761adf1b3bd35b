/**
 * Service info and health check routes
 */
import { Router } from 'express';
import type { HealthResponse, PersonaSource } from '../types/index';
import { API_VERSION } from '../config/index';
import { ConversationService } from '../services/conversation';

export const SERVICE_NAME = 'persona-link-bot';

export interface ServiceInfo {
  service: string;
  version: string;
  endpoints: string[];
}

export function buildServiceInfo(): ServiceInfo {
  return {
    service: SERVICE_NAME,
    version: API_VERSION,
    endpoints: ['GET /health', 'POST /ingest', 'POST /chat'],
  };
}

export function buildHealth(personas: PersonaSource, store: ConversationService): HealthResponse {
  return {
    status: 'ok',
    version: API_VERSION,
    personas: personas.listPersonaIds().length,
    stats: store.getStats(),
  };
}

/**
 * Creates Express router for GET / and GET /health
 */
export function createHealthRouter(personas: PersonaSource, store: ConversationService): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json(buildServiceInfo());
  });

  router.get('/health', (_req, res) => {
    res.json(buildHealth(personas, store));
  });

  return router;
}
