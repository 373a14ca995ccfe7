/**
 * ToolRegistry Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { ToolRegistry, asyncTool, syncTool } from '../tools/registry.js';
import { ToolExecutionError, ToolNotFoundError } from '../errors.js';
import { ValidationError } from '../../errors/index.js';
import { createRecordingLogger } from '../../test-utils/index.js';
import type { ToolParameterSchema } from '../../providers/types.js';

const OBJECT_SCHEMA: ToolParameterSchema = { type: 'object', properties: {} };

describe('ToolRegistry', () => {
  it('executes a registered echo tool', async () => {
    const registry = new ToolRegistry();
    registry.registerHandler('echo', 'Return the input', OBJECT_SCHEMA, (input) => input);

    await expect(registry.executeTool('echo', { x: 1 })).resolves.toEqual({ x: 1 });
  });

  it('throws ToolNotFoundError for unknown tools', async () => {
    const registry = new ToolRegistry();
    registry.registerHandler('echo', 'Return the input', OBJECT_SCHEMA, (input) => input);

    const error = await registry.executeTool('missing', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolNotFoundError);
    expect(error).toMatchObject({ message: 'Tool not found: missing', hint: 'Registered tools: echo' });
  });

  it('awaits asynchronous handlers', async () => {
    const registry = new ToolRegistry();
    registry.registerHandler('later', 'Resolve later', OBJECT_SCHEMA, async (input) => ({ got: input.n }));

    await expect(registry.executeTool('later', { n: 2 })).resolves.toEqual({ got: 2 });
  });

  it('wraps handler failures with the original cause', async () => {
    const registry = new ToolRegistry();
    const boom = new Error('boom');
    registry.registerHandler('broken', 'Always fails', OBJECT_SCHEMA, () => {
      throw boom;
    });

    const error = await registry.executeTool('broken', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error).toMatchObject({ message: 'Tool "broken" failed: boom', toolName: 'broken', cause: boom });
  });

  it('validates input before the handler runs', async () => {
    const registry = new ToolRegistry();
    let calls = 0;
    registry.register(
      syncTool({
        name: 'add',
        description: 'Add two numbers',
        parameters: {
          type: 'object',
          properties: { a: { type: 'number' }, b: { type: 'number' } },
          required: ['a', 'b'],
        },
        input: z.object({ a: z.number(), b: z.number() }),
        handler: ({ a, b }) => {
          calls++;
          return a + b;
        },
      })
    );

    await expect(registry.executeTool('add', { a: 1, b: 2 })).resolves.toBe(3);
    const error = await registry.executeTool('add', { a: 1 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error instanceof ToolExecutionError && error.cause).toBeInstanceOf(ValidationError);
    expect(calls).toBe(1);
  });

  it('passes the context to the handler', async () => {
    const registry = new ToolRegistry();
    registry.register(
      asyncTool({
        name: 'whoami',
        description: 'Report the session',
        parameters: OBJECT_SCHEMA,
        input: z.object({}),
        handler: async (_input, context) => context.sessionId,
      })
    );

    await expect(registry.executeTool('whoami', {}, { sessionId: 'session-7' })).resolves.toBe('session-7');
  });

  it('rethrows the handler rejection unchanged once aborted', async () => {
    const registry = new ToolRegistry();
    const controller = new AbortController();
    const abort = new Error('aborted');
    registry.registerHandler('slow', 'Aborts', OBJECT_SCHEMA, async () => {
      controller.abort();
      throw abort;
    });

    await expect(registry.executeTool('slow', {}, { signal: controller.signal })).rejects.toBe(abort);
  });

  it('replaces a tool registered twice and logs it', async () => {
    const logger = createRecordingLogger();
    const registry = new ToolRegistry(logger);
    registry.registerHandler('echo', 'first', OBJECT_SCHEMA, () => 'first');
    registry.registerHandler('echo', 'second', OBJECT_SCHEMA, () => 'second');

    await expect(registry.executeTool('echo', {})).resolves.toBe('second');
    expect(registry.size).toBe(1);
    expect(logger.warnings).toEqual(['Tool "echo" registered again, replacing the earlier definition']);
  });

  it('exports provider-agnostic schemas', () => {
    const registry = new ToolRegistry();
    registry.registerHandler('echo', 'Return the input', OBJECT_SCHEMA, (input) => input);

    expect(registry.getToolSchemas()).toEqual([
      { name: 'echo', description: 'Return the input', schema: OBJECT_SCHEMA },
    ]);
    expect(registry.listTools()).toEqual([{ name: 'echo', description: 'Return the input' }]);
    expect(registry.has('echo')).toBe(true);
    expect(registry.has('missing')).toBe(false);
  });
});
