export * from './types';
export { SpawnCommandRunner, shouldUseWindowsShell, resolveCommand } from './spawn';
