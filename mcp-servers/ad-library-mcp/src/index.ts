#!/usr/bin/env node

import express from 'express';
import cors from 'cors';
import type { Server as HttpServer } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { MediaCacheService } from './cache/media-cache-service.js';
import { ScrapeCreatorsClient } from './clients/ad-library-client.js';
import { GeminiMediaAnalyzer } from './clients/media-analysis-client.js';
import { HttpMediaFetcher } from './clients/media-fetcher.js';
import { loadEnvConfig, type EnvConfig } from './config/env.js';
import { mapToolError } from './mcp/errors.js';
import { AdLibraryToolHandlers } from './mcp/handlers.js';
import { AdLibraryService } from './services/AdLibraryService.js';
import { MediaAnalysisService } from './services/MediaAnalysisService.js';
import { logger } from './utils/logger.js';

const env = loadEnvConfig();
logger.level = env.logLevel;

logger.info('Environment loaded', {
  cacheDir: env.mediaCache.rootDir,
  geminiModel: env.geminiModel,
  scrapeCreatorsKey: env.scrapeCreatorsApiKey ? 'present' : 'missing',
  geminiKey: env.geminiApiKey ? 'present' : 'missing',
  httpTransportEnabled: env.httpTransportEnabled,
});

class AdLibraryMCPServer {
  private readonly server: Server;
  private readonly handlers: AdLibraryToolHandlers;
  private readonly mediaCache: MediaCacheService;
  private readonly httpApp: express.Express;
  private httpServer?: HttpServer;

  constructor(config: EnvConfig) {
    this.server = new Server(
      {
        name: 'ad-library-mcp-server',
        version: '1.0.0',
      },
      {
        capabilities: { tools: {} },
      }
    );

    this.mediaCache = MediaCacheService.open({ rootDir: config.mediaCache.rootDir });
    const adLibraryClient = new ScrapeCreatorsClient({
      apiKey: config.scrapeCreatorsApiKey,
      timeoutMs: config.timeouts.defaultMs,
    });
    const analyzer = new GeminiMediaAnalyzer({ apiKey: config.geminiApiKey, model: config.geminiModel });
    const fetcher = new HttpMediaFetcher({ timeoutMs: config.timeouts.defaultMs });

    this.handlers = new AdLibraryToolHandlers({
      adLibrary: new AdLibraryService(adLibraryClient),
      mediaAnalysis: new MediaAnalysisService(this.mediaCache, fetcher, analyzer, {
        imageTimeoutMs: config.timeouts.defaultMs,
        videoTimeoutMs: config.timeouts.videoMs,
      }),
      mediaCache: this.mediaCache,
      defaultMaxAgeDays: config.mediaCache.maxAgeDays,
    });
    this.httpApp = express();

    if (config.httpTransportEnabled) {
      this.setupHttpServer(config.port);
    }
    this.setupToolHandlers();
  }

  private setupHttpServer(port: number): void {
    this.httpApp.use(cors());
    this.httpApp.use(express.json({ limit: '2mb' }));

    this.httpApp.post('/mcp', async (req, res) => {
      const requestId = req.body?.id;
      const method = req.body?.method;

      try {
        if (method === 'tools/list') {
          res.json({
            id: requestId,
            jsonrpc: '2.0',
            result: { tools: this.handlers.getTools() },
          });
          return;
        }

        if (method === 'tools/call') {
          const toolName = req.body?.params?.name;
          const args = req.body?.params?.arguments;
          logger.info('HTTP MCP tool call', { toolName });

          const result = await this.handlers.handleToolCall(String(toolName), args);
          res.json({
            id: requestId,
            jsonrpc: '2.0',
            result: {
              content: [{ type: 'text', text: JSON.stringify(result) }],
            },
          });
          return;
        }

        res.status(400).json({
          id: requestId,
          jsonrpc: '2.0',
          error: { code: -32600, message: 'Invalid Request' },
        });
      } catch (error) {
        const mapped = mapToolError(error);
        logger.error('HTTP MCP error', {
          method,
          message: mapped.error.data.message,
          status: mapped.status,
        });

        res.status(mapped.status).json({
          id: requestId || null,
          jsonrpc: '2.0',
          error: mapped.error,
        });
      }
    });

    this.httpServer = this.httpApp.listen(port, () => {
      logger.info(`HTTP MCP server listening on port ${port}`);
    });
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.handlers.getTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      logger.info('Stdio MCP tool call', { toolName: name });
      try {
        const result = await this.handlers.handleToolCall(name, args);
        return {
          content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        };
      } catch (error) {
        const mapped = mapToolError(error);
        logger.error('Stdio MCP tool call failed', { toolName: name, message: mapped.error.data.message });
        return {
          content: [{ type: 'text', text: JSON.stringify({ success: false, error: mapped.error.data }, null, 2) }],
          isError: true,
        };
      }
    });
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info('Ad Library MCP Server started');
  }

  async stop(): Promise<void> {
    await this.server.close();
    this.httpServer?.close();
    this.mediaCache.close();
    logger.info('Ad Library MCP Server stopped');
  }
}

const server = new AdLibraryMCPServer(env);

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Failed to stop Ad Library MCP Server', {
          message: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  });
}

server.start().catch((error) => {
  logger.error('Failed to start Ad Library MCP Server', {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
