export { loadConfig, defaultConfig, saveConfig, resolveConfigPath, DEFAULT_CONFIG_FILE, MAX_TIMEOUT_SECONDS } from './config.js';
export type { Config, LoadConfigOptions } from './config.js';
export { AppError, ConfigError, TimeoutError, AbortedError, errorMessage } from './errors.js';
export type { ErrorComponent } from './errors.js';
export { configureLogger, logger } from './logger.js';
export type { LogLevel, Logger } from './logger.js';
export { configureMetrics } from './metrics.js';
export { summarizeReport } from './health.js';
export type { ComponentStatus, ComponentHealth, HealthStatus } from './health.js';
export { DiagnosticOrchestrator } from './diagnostics/orchestrator.js';
export type { OrchestratorDeps } from './diagnostics/orchestrator.js';
export { buildProbeSettings, createOrchestrator } from './diagnostics/options.js';
export type { CreateOrchestratorOptions } from './diagnostics/options.js';
export { ProcessCommandRunner } from './diagnostics/runner.js';
export type { CommandRunner, CommandOutput, RunOptions } from './diagnostics/runner.js';
export { NetworkFactResolver, describeDnsOutcome } from './diagnostics/resolver.js';
export type { ResolverDeps, HostLookup, InterfaceEnumerator } from './diagnostics/resolver.js';
export { discoverGateway, parseRouteTable, parseLabelledGateway } from './diagnostics/gateway.js';
export { ping, pingArgs, isPingFailure } from './diagnostics/ping.js';
export { selectPlatform, linuxPlatform, windowsPlatform, darwinPlatform } from './diagnostics/platform.js';
export type { PlatformStrategy, PlatformFamily } from './diagnostics/platform.js';
export { NOT_AVAILABLE, NOT_CHECKED, GATEWAY_NOT_FOUND } from './diagnostics/types.js';
export type { DiagnosticReport, DnsResult, ProbeOutcome, ProbeSettings, FailureKind, LocalAddress } from './diagnostics/types.js';
