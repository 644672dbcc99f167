import { CommandExecutionBackend } from './command.backend.js';
import type { ExecutionBackend } from './execution.backend.js';
import { SimulatorExecutionBackend, type SimulatorOptions } from './simulator.backend.js';

export type ExecutionBackendConfig =
  | { kind: 'simulator'; simulator: SimulatorOptions }
  | { kind: 'command'; template: string };

export function createExecutionBackend(config: ExecutionBackendConfig): ExecutionBackend {
  switch (config.kind) {
    case 'simulator':
      return new SimulatorExecutionBackend(config.simulator);
    case 'command':
      return new CommandExecutionBackend({ template: config.template });
  }
}

export * from './execution.backend.js';
export { SimulatorExecutionBackend, CommandExecutionBackend };
export type { SimulatorOptions };
