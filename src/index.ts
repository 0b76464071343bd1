#!/usr/bin/env node
/**
 * Main entry point for the Calendar Sync Server
 */

import { pathToFileURL } from 'url';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  MCPProtocolHandler,
  HTTPBridge,
  SYNC_EVENTS_TOOL,
  LIST_EVENTS_TOOL,
  SEARCH_EVENTS_TOOL,
  CLEAR_EVENTS_TOOL,
  REPUBLISH_CALENDAR_TOOL,
  handleSyncEvents,
  handleListEvents,
  handleSearchEvents,
  handleClearEvents,
  handleRepublishCalendar
} from './server/index.js';
import { ConfigManager } from './services/ConfigManager.js';
import { EventStore } from './services/EventStore.js';
import { SyncService, syncSettingsFrom } from './services/SyncService.js';
import { GistPublisher } from './adapters/GistPublisher.js';
import { Publisher } from './interfaces/Publisher.js';

// Global application state for proper shutdown
export interface AppState {
  configManager: ConfigManager;
  eventStore: EventStore;
  syncService: SyncService;
  mcpHandler: MCPProtocolHandler;
  httpBridge: HTTPBridge | null;
  isShuttingDown: boolean;
}

let appState: AppState | null = null;

/**
 * Publisher for the current configuration, or null when no gist or token is set
 */
function createPublisher(configManager: ConfigManager): Publisher | null {
  const publish = configManager.getPublishConfig();
  if (!publish) {
    console.error('Publishing disabled: no gist id or token configured');
    return null;
  }
  return new GistPublisher(publish);
}

/**
 * Load configuration and initialize all core services
 */
async function initializeServices(): Promise<AppState> {
  console.error('Initializing core services...');

  const configManager = new ConfigManager(process.env.CALENDAR_SYNC_CONFIG);
  const config = await configManager.loadConfig();
  console.error(`Loaded configuration from ${configManager.getConfigPath()} (time mode ${config.time.mode})`);

  const eventStore = new EventStore(config.database.path);
  const syncService = new SyncService(eventStore, syncSettingsFrom(config), createPublisher(configManager));

  const mcpHandler = new MCPProtocolHandler('calendar-sync-server', '1.0.0');

  const httpBridge = config.server.autoStart
    ? new HTTPBridge(configManager, syncService, { port: config.server.port, host: config.server.host })
    : null;

  const state: AppState = {
    configManager,
    eventStore,
    syncService,
    mcpHandler,
    httpBridge,
    isShuttingDown: false
  };

  // Set up configuration change listener for dynamic updates
  configManager.addConfigListener(updatedConfig => {
    if (state.isShuttingDown) return;
    state.syncService.configure(syncSettingsFrom(updatedConfig), createPublisher(configManager));
    console.error('Configuration updated, sync settings reloaded');
  });

  console.error('Core services initialized successfully');
  return state;
}

/**
 * Register MCP tools with their handlers
 */
function registerMCPTools(state: AppState): void {
  const toolRegistry = state.mcpHandler.getToolRegistry();
  toolRegistry.setDependencies(state.syncService);

  toolRegistry.registerTool(SYNC_EVENTS_TOOL, handleSyncEvents);
  toolRegistry.registerTool(LIST_EVENTS_TOOL, handleListEvents);
  toolRegistry.registerTool(SEARCH_EVENTS_TOOL, handleSearchEvents);
  toolRegistry.registerTool(CLEAR_EVENTS_TOOL, handleClearEvents);
  toolRegistry.registerTool(REPUBLISH_CALENDAR_TOOL, handleRepublishCalendar);

  console.error(`Registered ${toolRegistry.getToolCount()} MCP tools`);
}

/**
 * Start HTTP bridge for local front ends
 */
async function startHTTPBridge(state: AppState): Promise<void> {
  if (!state.httpBridge) {
    console.error('HTTP bridge disabled by configuration');
    return;
  }

  try {
    await state.httpBridge.start();
  } catch (error) {
    console.error('Failed to start HTTP bridge:', error);
    console.error('Continuing with the MCP transport only');
    state.httpBridge = null;
  }
}

/**
 * Connect to MCP transport
 */
async function connectMCPTransport(state: AppState): Promise<void> {
  const transport = new StdioServerTransport();

  transport.onclose = () => {
    console.error('MCP transport closed');
  };

  transport.onerror = (error: Error) => {
    console.error('MCP transport error:', error);
  };

  await state.mcpHandler.connect(transport);
  console.error('MCP transport connected successfully');
}

/**
 * Stop the bridge and close the store
 */
async function shutdownServices(state: AppState): Promise<void> {
  state.isShuttingDown = true;
  if (state.httpBridge) {
    await state.httpBridge.stop();
  }
  await state.mcpHandler.close();
  await state.eventStore.close();
}

/**
 * Set up graceful shutdown handlers
 */
function setupShutdownHandlers(state: AppState): void {
  const shutdown = async (signal: string): Promise<void> => {
    if (state.isShuttingDown) {
      console.error('Shutdown already in progress...');
      return;
    }

    console.error(`Received ${signal}, shutting down gracefully...`);

    try {
      await shutdownServices(state);
      console.error('Shutdown completed successfully');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch(error => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  process.on('uncaughtException', error => {
    console.error('Uncaught exception:', error);
    onSignal('uncaughtException');
  });

  process.on('unhandledRejection', reason => {
    console.error('Unhandled rejection:', reason);
    onSignal('unhandledRejection');
  });
}

/**
 * Main application startup sequence
 */
async function main(): Promise<void> {
  console.error('Calendar Sync Server starting...');

  try {
    appState = await initializeServices();
    registerMCPTools(appState);
    await startHTTPBridge(appState);
    await connectMCPTransport(appState);
    setupShutdownHandlers(appState);

    console.error('Calendar Sync Server started and ready for requests');
    console.error(`- MCP Tools: ${appState.mcpHandler.getToolRegistry().getToolCount()}`);
    console.error(`- Stored events: ${await appState.syncService.count()}`);
    console.error(`- Publishing: ${appState.syncService.isPublishingEnabled() ? 'enabled' : 'disabled'}`);
    console.error(`- HTTP Bridge: ${appState.httpBridge?.isRunning() ? 'running' : 'not running'}`);
  } catch (error) {
    console.error('Failed to start server:', error);

    if (appState) {
      try {
        await shutdownServices(appState);
      } catch (cleanupError) {
        console.error('Error during cleanup:', cleanupError);
      }
    }

    process.exit(1);
  }
}

export { initializeServices, registerMCPTools, startHTTPBridge, connectMCPTransport, setupShutdownHandlers, shutdownServices };

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(error => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
