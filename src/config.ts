// src/config.ts
import { z } from 'zod';

const ConfigSchema = z.object({
  GOOGLE_SLIDES_TOKEN_PATH: z.string().min(1).default('token.json'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  MCP_TRANSPORT: z.enum(['stdio', 'httpStream']).default('stdio'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
});

export type LogLevel = z.infer<typeof ConfigSchema>['LOG_LEVEL'];

export interface ServerConfig {
  tokenPath: string;
  logLevel: LogLevel;
  transport: 'stdio' | 'httpStream';
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return {
    tokenPath: parsed.data.GOOGLE_SLIDES_TOKEN_PATH,
    logLevel: parsed.data.LOG_LEVEL,
    transport: parsed.data.MCP_TRANSPORT,
    port: parsed.data.PORT,
  };
}
