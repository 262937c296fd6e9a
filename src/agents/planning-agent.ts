/**
 * PlanningAgent - task decomposition, workflow plans, resource allocation
 * and timelines.
 *
 * @module agents/planning-agent
 */

import type { TaskDescriptor } from '../types/task.js';
import { BaseAgent } from './base-agent.js';

/**
 * A plan the agent produced, kept in its planning history.
 */
export interface PlanRecord {
  kind: 'decomposition' | 'workflow' | 'allocation' | 'timeline';
  subject: string;
  content: string;
  createdAt: string;
}

export class PlanningAgent extends BaseAgent {
  protected readonly capabilities = ['task_decomposition', 'workflow_planning', 'resource_allocation'];
  protected readonly tools = ['calendar', 'project_management', 'timeline_generator', 'resource_calculator'];

  private readonly planningHistory: PlanRecord[] = [];

  protected getAgentName(): string {
    return 'PlanningAgent';
  }

  protected async handleTask(task: TaskDescriptor): Promise<string> {
    const message = task.message.toLowerCase();

    if (task.type === 'task_decomposition' || message.includes('break down')) {
      return this.decomposeTask(task);
    }
    if (task.type === 'workflow_planning' || message.includes('plan')) {
      return this.createWorkflowPlan(task);
    }
    if (task.type === 'resource_allocation' || message.includes('resource')) {
      return this.allocateResources(task);
    }
    if (message.includes('schedule') || message.includes('timeline')) {
      return this.createTimeline(task);
    }
    return this.generalPlanning(task);
  }

  async decomposeTask(task: TaskDescriptor): Promise<string> {
    this.updateMemory('current_decomposition', task.message);

    const prompt = [
      'You are an expert project manager. Break down this task into manageable subtasks:',
      `Main Task: "${task.message}"`,
      `Context: ${JSON.stringify(task.context, null, 2)}`,
      '',
      'Provide the breakdown structure, dependencies, effort estimates, priorities and required skills.',
    ].join('\n');

    return this.plan('decomposition', task.message, prompt, 'Error decomposing task');
  }

  async createWorkflowPlan(task: TaskDescriptor): Promise<string> {
    this.updateMemory('current_workflow', task.message);

    const prompt = [
      'Create a workflow plan for this project:',
      `Project: "${task.message}"`,
      `Requirements: ${JSON.stringify(task.context, null, 2)}`,
      '',
      'Include phases and milestones, task dependencies, resource needs, risks, quality checkpoints and success criteria.',
    ].join('\n');

    return this.plan('workflow', task.message, prompt, 'Error creating workflow plan');
  }

  async allocateResources(task: TaskDescriptor): Promise<string> {
    this.updateMemory('current_allocation', task.message);
    const resources = task.context.resources ?? {};

    const prompt = [
      'Plan resource allocation for this project:',
      `Project: "${task.message}"`,
      `Available Resources: ${JSON.stringify(resources, null, 2)}`,
      '',
      'Cover people, budget, tooling, timeline considerations and contingencies.',
    ].join('\n');

    return this.plan('allocation', task.message, prompt, 'Error allocating resources');
  }

  async createTimeline(task: TaskDescriptor): Promise<string> {
    this.updateMemory('current_timeline', task.message);
    const deadline = typeof task.context.deadline === 'string' ? task.context.deadline : 'Not specified';

    const breakdown = await this.decomposeTask(task);
    const prompt = [
      'Create a project timeline based on this task breakdown:',
      `Project: "${task.message}"`,
      `Deadline: ${deadline}`,
      `Task Breakdown: ${breakdown}`,
      '',
      'Provide milestones, the critical path, buffers and progress checkpoints.',
    ].join('\n');

    return this.plan('timeline', task.message, prompt, 'Error creating timeline');
  }

  async generalPlanning(task: TaskDescriptor): Promise<string> {
    const message = task.message.toLowerCase();

    if (message.includes('break') || message.includes('decompose')) {
      return this.decomposeTask(task);
    }
    if (message.includes('workflow') || message.includes('process')) {
      return this.createWorkflowPlan(task);
    }
    if (message.includes('allocate')) {
      return this.allocateResources(task);
    }

    const decomposition = await this.decomposeTask(task);
    const workflow = await this.createWorkflowPlan(task);
    const timeline = await this.createTimeline(task);

    return [
      'Comprehensive Planning Report:',
      '',
      'TASK BREAKDOWN:',
      decomposition,
      '',
      'WORKFLOW PLAN:',
      workflow,
      '',
      'PROJECT TIMELINE:',
      timeline,
    ].join('\n');
  }

  getPlanningHistory(): PlanRecord[] {
    return this.planningHistory.map((record) => ({ ...record }));
  }

  private async plan(
    kind: PlanRecord['kind'],
    subject: string,
    prompt: string,
    failurePrefix: string
  ): Promise<string> {
    try {
      const content = await this.generate(prompt);
      const record: PlanRecord = { kind, subject, content, createdAt: this.now().toISOString() };
      this.planningHistory.push(record);
      this.updateMemory(`last_${kind}`, record);
      return content;
    } catch (error) {
      this.logger.warn({ err: error, kind }, 'Planning step failed');
      return `${failurePrefix}: ${error instanceof Error ? error.message : String(error)}`;
    }
  }
}
