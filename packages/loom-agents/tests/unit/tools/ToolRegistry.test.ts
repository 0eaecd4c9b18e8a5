/**
 * Tests for ToolRegistry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ToolRegistry } from '../../../src/tools/ToolRegistry.js';
import { ToolRegistrationError } from '../../../src/tools/errors.js';
import { EchoTool, FailingTool } from '../../mocks/EchoTool.js';
import { RecordingLogger } from '../../mocks/RecordingLogger.js';

describe('ToolRegistry', () => {
  let registry: ToolRegistry;
  let echo: EchoTool;

  beforeEach(() => {
    registry = new ToolRegistry();
    echo = new EchoTool();
    registry.register(echo);
  });

  describe('registration', () => {
    it('should register and look up tools', () => {
      expect(registry.has('echo')).toBe(true);
      expect(registry.get('echo')).toBe(echo);
      expect(registry.list()).toHaveLength(1);
    });

    it('should reject a duplicate name', () => {
      expect(() => registry.register(new EchoTool())).toThrow(ToolRegistrationError);
    });

    it('should unregister tools', () => {
      expect(registry.unregister('echo')).toBe(true);
      expect(registry.unregister('echo')).toBe(false);
      expect(registry.has('echo')).toBe(false);
    });

    it('should list only enabled tools', () => {
      registry.register(new EchoTool({ name: 'quiet', enabled: false }));

      expect(registry.listEnabled().map((tool) => tool.definition.name)).toEqual(['echo']);
    });
  });

  describe('execute', () => {
    it('should run the tool with validated arguments', async () => {
      const result = await registry.execute('echo', { value: 'ok' }, { threadId: 't1' });

      expect(result.success).toBe(true);
      expect(result.output).toBe('ok');
      expect(typeof result.metadata?.executionTime).toBe('number');
      expect(echo.contexts).toEqual([{ threadId: 't1' }]);
    });

    it('should report an unknown tool', async () => {
      expect(await registry.execute('missing', {})).toEqual({
        success: false,
        error: "Tool 'missing' not found",
      });
    });

    it('should report a disabled tool', async () => {
      registry.register(new EchoTool({ name: 'quiet', enabled: false }));

      expect(await registry.execute('quiet', { value: 'x' })).toEqual({
        success: false,
        error: "Tool 'quiet' is disabled",
      });
    });

    it('should report invalid arguments', async () => {
      expect(await registry.execute('echo', {})).toEqual({
        success: false,
        error: 'Invalid arguments: value: Required',
      });
    });

    it('should turn a thrown error into a failed result', async () => {
      registry.register(new FailingTool('kaput'));

      expect(await registry.execute('explode', {})).toEqual({ success: false, error: 'kaput' });
    });

    it('should log tool failures', async () => {
      const logger = new RecordingLogger();
      const logged = new ToolRegistry({ logger });
      logged.register(new FailingTool('kaput'));

      await logged.execute('explode', {}, { threadId: 't1' });

      expect(logger.at('warn')).toEqual([
        {
          level: 'warn',
          message: 'Tool execution failed',
          meta: { tool: 'explode', threadId: 't1', error: 'kaput' },
        },
      ]);
    });
  });

  describe('schemas', () => {
    it('should describe tools as JSON schema', () => {
      const [tool] = registry.getLLMTools();

      expect(tool?.name).toBe('echo');
      expect(tool?.description).toBe('Echo the given value back');
      expect(tool?.parameters).toMatchObject({
        type: 'object',
        properties: { value: { type: 'string', description: 'Value to echo' } },
        required: ['value'],
      });
      expect(tool?.parameters).not.toHaveProperty('$schema');
    });

    it('should return schemas for named tools only', () => {
      registry.register(new FailingTool());

      expect(registry.getSchemas(['explode', 'missing']).map((schema) => schema['name'])).toEqual([
        'explode',
      ]);
    });
  });
});
