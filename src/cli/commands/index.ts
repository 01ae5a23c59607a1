/**
 * @module cli/commands
 * @description CLI command exports
 * @dependencies commander
 */

export { createMonitorCommand, runMonitor, type MonitorOptions, type MonitorDeps } from './monitor';
