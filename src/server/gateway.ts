/**
 * Startup wiring: registry, filter config, gate controller, classifier,
 * protocol handler and HTTP app, in dependency order.
 */

import type { Express } from 'express';
import type { ApplianceTransport } from '../client/appliance-client.js';
import { loadFilterConfig } from '../config/filter-config.js';
import type { GatewaySettings } from '../config/settings.js';
import { ToolGateController, type GateControllerOptions } from '../gating/gate-controller.js';
import { Authenticator } from '../http/auth.js';
import { KeywordIntentClassifier } from '../intent/classifier.js';
import { createToolRegistry, type ToolRegistry } from '../tools/index.js';
import { createApp } from './app.js';
import { GatewayProtocolHandler } from './protocol-handler.js';

export interface Gateway {
  registry: ToolRegistry;
  gate: ToolGateController;
  classifier: KeywordIntentClassifier;
  handler: GatewayProtocolHandler;
  app: Express;
}

export function createGateway(
  settings: GatewaySettings,
  client: ApplianceTransport,
  options: GateControllerOptions = {}
): Gateway {
  const registry = createToolRegistry(client, settings);
  const { config, intentKeywords } = loadFilterConfig(settings, registry.getAllTools());
  const gate = new ToolGateController(registry.getAllTools(), config, settings, options);
  const classifier = new KeywordIntentClassifier(intentKeywords);
  const handler = new GatewayProtocolHandler(registry, gate, classifier, settings);
  const app = createApp({ handler, authenticator: new Authenticator(settings), settings });

  return { registry, gate, classifier, handler, app };
}
