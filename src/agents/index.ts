/**
 * Agents module - agent base class and specialist agents.
 *
 * Provides:
 * - BaseAgent: Abstract base class implementing the agent handle contract
 * - ResearchAgent: Search planning, analysis and reports
 * - PlanningAgent: Decomposition, workflows, resources and timelines
 */

export {
  AGENT_VERSION,
  BaseAgent,
  type BaseAgentConfig,
  type DelegationOutcome,
} from './base-agent.js';

export { ResearchAgent } from './research-agent.js';
export { PlanningAgent, type PlanRecord } from './planning-agent.js';
