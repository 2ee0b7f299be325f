export { BoundedPool } from './pool.js';
export { runSessions, playerSessionFactory, createPolicy } from './fleet.js';
export type { FleetOptions, FleetResult, SessionFactory, SessionRunner, OutcomeKey } from './fleet.js';
export { runFlood, fetchSender, pause } from './flood.js';
export type { FloodOptions, FloodResult, RequestSender } from './flood.js';
export { probeTcp, probeHttp, StartupError } from './probe.js';
export { loadConfig, usage, ConfigError, RunConfigSchema, DEFAULTS, SETTINGS, SCENARIOS, POLICIES } from './config.js';
export type { RunConfig, Scenario, PolicyName, LoadConfigResult } from './config.js';
export { formatFleetSummary, formatFloodSummary, formatDuration } from './report.js';
export { runScenario } from './runner.js';
export type { RunDeps } from './runner.js';
export { createLogger } from './logger.js';
