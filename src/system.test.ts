/**
 * Tests for AgentMesh assembly (src/system.ts)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createAgentMesh } from './system.js';
import { parseConfig } from './config/loader.js';
import { LlmProviderFactory } from './llm/factory.js';
import type { LlmProvider } from './llm/types.js';
import type { TaskDescriptor } from './types/task.js';
import { ConfigurationError } from './utils/errors.js';

vi.mock('./utils/logger.js', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

function createStubProvider(): LlmProvider {
  return {
    name: 'stub',
    generate: vi.fn().mockResolvedValue('stub reply'),
    toolCall: vi.fn().mockResolvedValue({ message: '', toolCalls: [] }),
  };
}

describe('createAgentMesh', () => {
  let llm: LlmProvider;

  beforeEach(() => {
    llm = createStubProvider();
  });

  it('should create the configured agents and routing rules', () => {
    const mesh = createAgentMesh(parseConfig({}), { llm });

    expect(mesh.listAgentIds()).toEqual(['research-001', 'planning-001']);
    expect(mesh.router.getRoutingRules()).toEqual({
      research: ['research-001'],
      analysis: ['research-001'],
      planning: ['planning-001'],
    });
    expect(mesh.toolManager.listTools()).toEqual(['calculator', 'summarize', 'scheduler']);
  });

  it('should skip disabled agents', () => {
    const config = parseConfig({
      agents: [
        { id: 'research-001', kind: 'research' },
        { id: 'planning-001', kind: 'planning', enabled: false },
      ],
    });

    expect(createAgentMesh(config, { llm }).listAgentIds()).toEqual(['research-001']);
  });

  it('should resolve the provider by name from the factory', () => {
    const factory = new LlmProviderFactory();
    factory.registerProvider('stub', () => llm);

    const mesh = createAgentMesh(parseConfig({ llm: { provider: 'stub' } }), { providerFactory: factory });

    expect(mesh.getAgent('planning-001')).toBeDefined();
  });

  it('should raise ConfigurationError for an unknown provider', () => {
    expect(() => createAgentMesh(parseConfig({ llm: { provider: 'nope' } }))).toThrow(ConfigurationError);
  });

  it('should pre-register remote directory records', () => {
    const config = parseConfig({
      directory: [{ id: 'remote-1', name: 'Remote', description: 'Elsewhere', capabilities: ['translation'] }],
    });

    const mesh = createAgentMesh(config, { llm });

    expect(mesh.directory.get('remote-1')?.capabilities).toEqual(['translation']);
  });
});

describe('AgentMesh', () => {
  let llm: LlmProvider;

  beforeEach(() => {
    llm = createStubProvider();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should register agents in the directory on start', async () => {
    const mesh = createAgentMesh(parseConfig({ session: { cleanupIntervalMinutes: 0 } }), { llm });

    await mesh.start();

    expect(mesh.isRunning()).toBe(true);
    expect(mesh.transport.isRunning()).toBe(true);
    expect(mesh.directory.get('research-001')?.name).toBe('ResearchAgent');
    expect(mesh.directory.get('planning-001')?.capabilities).toEqual([
      'task_decomposition',
      'workflow_planning',
      'resource_allocation',
    ]);

    await mesh.stop();
  });

  it('should route research messages to the research agent', async () => {
    const mesh = createAgentMesh(parseConfig({}), { llm });

    const reply = await mesh.sessions.process('user-1', 'Please research solar panels');

    expect(reply).toBe(
      'Task completed by research-001: Search plan for "Please research solar panels":\nstub reply'
    );
  });

  it('should route planning messages to the planning agent', async () => {
    const mesh = createAgentMesh(parseConfig({}), { llm });

    expect(await mesh.sessions.process('user-1', 'Please plan the offsite')).toBe(
      'Task completed by planning-001: stub reply'
    );
  });

  it('should answer unroutable messages with the no-agent text', async () => {
    const mesh = createAgentMesh(parseConfig({}), { llm });

    expect(await mesh.sessions.process('user-1', 'implement a parser')).toBe(
      'No suitable agent found for task type: coding'
    );
  });

  it('should report delegation failures to remote agents without a route', async () => {
    const config = parseConfig({
      directory: [
        { id: 'remote-1', name: 'Coder', description: 'Remote', capabilities: ['code_generation', 'debugging'] },
      ],
      routing: { coding: ['remote-1'] },
    });
    const mesh = createAgentMesh(config, { llm });
    await mesh.start();

    const reply = await mesh.sessions.process('user-1', 'implement a parser');

    expect(reply).toBe(
      'Error executing task with agent remote-1: Failed to delegate to remote-1: No inbound handler attached for agent remote-1'
    );
    await mesh.stop();
  });

  it('should deliver delegations between hosted agents through the transport', async () => {
    const mesh = createAgentMesh(parseConfig({ session: { cleanupIntervalMinutes: 0 } }), { llm });
    await mesh.start();
    const task: TaskDescriptor = {
      type: 'planning',
      message: 'break down the launch',
      userId: 'user-1',
      requiredCapabilities: [],
      context: {},
      history: [],
      timestamp: '2024-01-01T00:00:00.000Z',
    };

    const outcome = await mesh.getAgent('research-001')?.delegateToOtherAgent('planning-001', task);
    const received = await mesh.getClient('planning-001')?.receive(0);

    expect(outcome).toEqual({
      success: true,
      result: { status: 'delivered', response: { status: 'accepted', message: 'Task delegation received' } },
    });
    expect(received).toMatchObject({ kind: 'task_delegation', from: 'research-001', to: 'planning-001', task });
    await mesh.stop();
  });

  it('should remove inactive sessions on the cleanup interval', async () => {
    vi.useFakeTimers();
    let clock = new Date('2024-01-01T00:00:00.000Z');
    const config = parseConfig({ session: { inactiveHours: 1, cleanupIntervalMinutes: 1 } });
    const mesh = createAgentMesh(config, { llm, now: () => clock });
    await mesh.start();

    await mesh.sessions.process('user-1', 'hello there');
    expect(mesh.sessions.stats().totalSessions).toBe(1);

    clock = new Date('2024-01-01T02:00:00.000Z');
    vi.advanceTimersByTime(60_000);

    expect(mesh.sessions.stats().totalSessions).toBe(0);
    await mesh.stop();
  });

  it('should shut agents down and leave the directory on stop', async () => {
    const mesh = createAgentMesh(parseConfig({}), { llm });
    await mesh.start();

    await mesh.stop();
    await mesh.stop();

    expect(mesh.isRunning()).toBe(false);
    expect(mesh.transport.isRunning()).toBe(false);
    expect(mesh.directory.get('research-001')).toBeUndefined();
    expect(mesh.getAgent('research-001')?.getStatus().status).toBe('shutting_down');
  });
});
