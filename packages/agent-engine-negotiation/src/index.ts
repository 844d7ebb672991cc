export {
  AgentRegistry,
  type AgentRegistryOptions,
  compareIds,
  createAgentRegistry,
  HEARTBEAT_TOPIC,
} from "./agentRegistry";
export { createRoleNegotiator, RoleNegotiator, type RoleNegotiatorOptions } from "./roleNegotiator";
export { TeamRoster, type TeamRosterOptions } from "./teamRoster";
export * from "./types";
