/**
 * Tank Simulation MCP Server
 *
 * Request/response boundary over the session registry. A client
 * initializes sessions, submits commands and polls snapshots; closing
 * the connection closes every session it created.
 *
 * Resources: read-only observation
 * Tools: session operations
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { DEFAULT_PLANT } from '../config.js';
import { ValidationError } from '../errors.js';
import { loggers } from '../logger.js';
import { SessionRegistry } from '../session/registry.js';
import type { SessionDriver } from '../session/loop.js';
import { parseEquilibrium } from '../validate.js';
import { VERSION } from '../version.js';

const log = loggers.mcp;

const SESSIONS_URI = 'tanks://sessions';

type ToolArgs = Record<string, unknown>;

// =============================================================================
// Argument Helpers
// =============================================================================

function requireString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value === '') {
    throw new ValidationError([{ path: key, message: 'parameter required' }], 'Invalid arguments');
  }
  return value;
}

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new ValidationError([{ path: key, message: 'must be a number' }], 'Invalid arguments');
  }
  return value;
}

function readDriver(args: ToolArgs): SessionDriver | undefined {
  const value = args.driver;
  if (value === undefined || value === 'timer' || value === 'manual') return value;
  throw new ValidationError([{ path: 'driver', message: `must be 'timer' or 'manual'` }], 'Invalid arguments');
}

function jsonResult(value: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
}

function errorResult(message: string) {
  return {
    isError: true,
    content: [{ type: 'text' as const, text: `Error: ${message}` }],
  };
}

// =============================================================================
// Server
// =============================================================================

/**
 * Create and configure the MCP server
 */
export function createMCPServer(registry: SessionRegistry = new SessionRegistry()): Server {
  const owned = new Set<string>();

  const server = new Server(
    {
      name: 'tank-mixing-sim',
      version: VERSION,
    },
    {
      capabilities: {
        resources: {},
        tools: {},
      },
    }
  );

  server.onclose = () => {
    for (const id of owned) {
      registry.connectionLost(id);
    }
    owned.clear();
  };

  // ==========================================================================
  // RESOURCES
  // ==========================================================================

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: [
        {
          uri: SESSIONS_URI,
          name: 'Simulation Sessions',
          description: 'Status of every open session (clock, ticks, queue depth, clamps)',
          mimeType: 'application/json',
        },
      ],
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;

    if (uri === SESSIONS_URI) {
      return {
        contents: [
          {
            uri,
            mimeType: 'application/json',
            text: JSON.stringify(registry.list(), null, 2),
          },
        ],
      };
    }

    return {
      contents: [
        {
          uri,
          mimeType: 'text/plain',
          text: `Error: Unknown resource: ${uri}`,
        },
      ],
    };
  });

  // ==========================================================================
  // TOOLS
  // ==========================================================================

  const sessionIdSchema = {
    type: 'string',
    description: 'Session id returned by session_initialize',
  };

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: 'session_initialize',
          description: 'Create and start a simulation session at an equilibrium point.',
          inputSchema: {
            type: 'object',
            properties: {
              samplingInterval: { type: 'number', description: 'Seconds between snapshots (> 0)' },
              noiseEnabled: { type: 'boolean', description: 'Perturb reported measurements' },
              noiseLevel: { type: 'number', description: 'Relative noise standard deviation, [0, 1]' },
              noiseSeed: { type: 'integer', description: 'Seed for reproducible noise' },
              equilibrium: {
                type: 'object',
                description: 'Initial levels, concentrations and controls (default plant operating point if omitted)',
              },
              driver: {
                type: 'string',
                enum: ['timer', 'manual'],
                description: 'timer: ticks on a wall-clock interval; manual: ticks only via session_tick',
              },
            },
            required: ['samplingInterval', 'noiseEnabled', 'noiseLevel'],
          },
        },
        {
          name: 'session_command',
          description: 'Queue an operator command, applied at the start of the next tick.',
          inputSchema: {
            type: 'object',
            properties: {
              session_id: sessionIdSchema,
              command: {
                type: 'object',
                description:
                  'One of {type:"setpoint",tank,variable,value}, {type:"clear-setpoint",tank,variable}, ' +
                  '{type:"pause"}, {type:"resume"}, {type:"reset"}, {type:"noise",enabled,level?}',
              },
            },
            required: ['session_id', 'command'],
          },
        },
        {
          name: 'session_tick',
          description: 'Advance a manual-driver session by one tick and return its snapshot.',
          inputSchema: {
            type: 'object',
            properties: { session_id: sessionIdSchema },
            required: ['session_id'],
          },
        },
        {
          name: 'session_snapshot',
          description:
            'Latest noise-free state of a session, or with emitted=true the last snapshot ' +
            'delivered to subscribers (measurement noise included; null before the first tick).',
          inputSchema: {
            type: 'object',
            properties: {
              session_id: sessionIdSchema,
              emitted: { type: 'boolean', description: 'Return the last emitted snapshot instead' },
            },
            required: ['session_id'],
          },
        },
        {
          name: 'session_status',
          description: 'Status report: clock, ticks, pending commands, clamps, dropped snapshots.',
          inputSchema: {
            type: 'object',
            properties: { session_id: sessionIdSchema },
            required: ['session_id'],
          },
        },
        {
          name: 'session_close',
          description: 'Close a session and release its resources. Idempotent.',
          inputSchema: {
            type: 'object',
            properties: { session_id: sessionIdSchema },
            required: ['session_id'],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name } = request.params;
    const args: ToolArgs = request.params.arguments ?? {};

    try {
      switch (name) {
        case 'session_initialize': {
          const handle = registry.initialize({
            samplingInterval: optionalNumber(args, 'samplingInterval') ?? NaN,
            noiseEnabled: args.noiseEnabled === true,
            noiseLevel: optionalNumber(args, 'noiseLevel') ?? 0,
            noiseSeed: optionalNumber(args, 'noiseSeed'),
            equilibrium:
              args.equilibrium === undefined ? undefined : parseEquilibrium(args.equilibrium, DEFAULT_PLANT),
            driver: readDriver(args),
          });
          owned.add(handle.id);
          log.info('Session opened over MCP', { id: handle.id });
          return jsonResult({ session_id: handle.id, status: registry.status(handle) });
        }

        case 'session_command': {
          const id = requireString(args, 'session_id');
          const queued = registry.submitCommand(id, args.command);
          return jsonResult({ queued: queued.seq, type: queued.command.type });
        }

        case 'session_tick': {
          const loop = registry.loop(requireString(args, 'session_id'));
          if (loop.driver !== 'manual') {
            return errorResult(`session ${loop.id} is driven by its timer`);
          }
          return jsonResult({ snapshot: loop.tick(), status: loop.getStatus().status });
        }

        case 'session_snapshot': {
          const id = requireString(args, 'session_id');
          return jsonResult(args.emitted === true ? registry.lastSnapshot(id) : registry.snapshot(id));
        }

        case 'session_status':
          return jsonResult(registry.status(requireString(args, 'session_id')));

        case 'session_close': {
          const id = requireString(args, 'session_id');
          const closed = registry.close(id);
          owned.delete(id);
          return jsonResult({ session_id: id, closed });
        }

        default:
          return errorResult(`Unknown tool: ${name}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.debug(`Tool ${name} failed: ${message}`);
      return errorResult(message);
    }
  });

  return server;
}

/**
 * Start MCP server with stdio transport
 */
export async function startMCPServer(registry: SessionRegistry = new SessionRegistry()): Promise<Server> {
  const server = createMCPServer(registry);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('Tank simulation MCP server started on stdio');
  return server;
}
