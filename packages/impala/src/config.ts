/**
 * @lakehouse/impala - Configuration
 *
 * Client configuration, validated with zod. Defaults follow the server's
 * standard ports and the shell's connection settings.
 */

import { z } from 'zod';

import { ConfigurationError } from './errors.js';

export const DEFAULT_SOCKET_PORT = 21050;
export const DEFAULT_HTTP_PORT = 28000;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const clientConfigSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535).optional(),
    protocol: z.enum(['rich', 'legacy']).default('rich'),
    transport: z.enum(['socket', 'http']).default('socket'),

    user: z.string().min(1).optional(),
    useLdap: z.boolean().default(false),
    ldapPassword: z.string().optional(),
    jwt: z.string().min(1).optional(),
    oauth: z.string().min(1).optional(),
    useKerberos: z.boolean().default(false),
    kerberosServiceName: z.string().min(1).default('impala'),
    /** Host (optionally host:port) whose name goes into the service principal */
    kerberosHostFqdn: z.string().min(1).optional(),

    useTls: z.boolean().default(false),
    /** CA bundle path. Without one, server certificates are not verified. */
    caCert: z.string().min(1).optional(),

    fetchSize: z.number().int().positive().default(10240),
    connectTimeoutMs: z.number().int().nonnegative().default(60000),
    connectMaxTries: z.number().int().positive().default(4),
    minRetrySleepSeconds: z.number().nonnegative().default(1),

    httpPath: z.string().default('cliservice'),
    httpCookieNames: z.array(z.string().min(1)).default([]),
    httpSocketTimeoutSeconds: z.number().positive().optional(),
    httpTracing: z.boolean().default(true),
    /** Value for the X-Forwarded-For header */
    forwardedFor: z.string().min(1).optional(),

    rpcTrace: z
      .object({
        stdout: z.boolean().default(false),
        file: z.string().min(1).optional(),
      })
      .default({}),

    logLevel: logLevelSchema.default('warn'),
  })
  .superRefine((config, ctx) => {
    if (config.protocol === 'legacy' && config.transport === 'http') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['transport'],
        message: 'the legacy protocol is only available over socket transports',
      });
    }
    if (config.useLdap && config.ldapPassword === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ldapPassword'],
        message: 'LDAP authentication needs a password',
      });
    }
  });

export type ImpalaClientConfigInput = z.input<typeof clientConfigSchema>;

export type ImpalaClientConfig = Omit<z.output<typeof clientConfigSchema>, 'port' | 'user'> & {
  port: number;
  user: string | undefined;
};

/**
 * Validate client configuration and fill in defaults.
 *
 * @throws ConfigurationError listing the first invalid setting
 */
export function parseConfig(
  input: ImpalaClientConfigInput,
  env: NodeJS.ProcessEnv = process.env
): ImpalaClientConfig {
  const result = clientConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigurationError(`Invalid ${path}: ${issue ? issue.message : 'invalid configuration'}`);
  }
  const config = result.data;
  return {
    ...config,
    port: config.port ?? (config.transport === 'http' ? DEFAULT_HTTP_PORT : DEFAULT_SOCKET_PORT),
    user: config.user ?? env.USER ?? env.LOGNAME,
  };
}
