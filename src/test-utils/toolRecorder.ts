// Collects tools as they are registered so tests can validate and run them in process.
import { vi } from 'vitest';
import type { ToolServer } from '../tools/context.js';

export interface ValidationResult {
  value?: unknown;
  issues?: ReadonlyArray<{ message: string }>;
}

export interface ToolLog {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface RecordedTool {
  name: string;
  parameters?: {
    '~standard': { validate(value: unknown): ValidationResult | Promise<ValidationResult> };
  };
  execute(args: unknown, context: { log: ToolLog }): Promise<unknown>;
}

export class ToolRecorder implements ToolServer {
  readonly tools = new Map<string, RecordedTool>();
  readonly log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  addTool(tool: RecordedTool): void {
    this.tools.set(tool.name, tool);
  }

  get(name: string): RecordedTool {
    const tool = this.tools.get(name);
    if (!tool) throw new Error(`Tool ${name} was not registered`);
    return tool;
  }

  /** Runs arguments through the tool's parameter schema, as the server does before execute. */
  async validate(name: string, args: unknown): Promise<ValidationResult> {
    const schema = this.get(name).parameters;
    if (!schema) return { value: args };
    return schema['~standard'].validate(args);
  }

  async run(name: string, args: unknown): Promise<unknown> {
    const result = await this.validate(name, args);
    if (result.issues) {
      throw new Error(`Invalid arguments for ${name}: ${result.issues.map((issue) => issue.message).join('; ')}`);
    }
    return this.get(name).execute(result.value, { log: this.log });
  }
}
