/**
 * @lakehouse/impala - Transport Factory
 *
 * Chooses and builds the transport for a configuration. Authentication
 * priority when several modes are configured: LDAP > JWT > OAuth > Kerberos > none.
 */

import * as tls from 'node:tls';

import type { ImpalaClientConfig } from '../config.js';
import { ConfigurationError, NotSupportedError } from '../errors.js';
import type { Logger } from '../logger.js';

import { HttpTransport, fetchSender, httpsSender } from './http.js';
import type { HttpAuth, HttpSender } from './http.js';
import { PlainMechanism } from './sasl.js';
import { SocketTransport } from './socket.js';
import type { SocketConnector } from './socket.js';
import type { GssapiProvider, SaslMechanism, Transport } from './types.js';

export type AuthMode = 'ldap' | 'jwt' | 'oauth' | 'kerberos' | 'none';

/**
 * Runtime features transports depend on
 */
export interface RuntimeCapabilities {
  /** TLS contexts (node:tls) */
  tlsContext: boolean;
  /** A global fetch implementation */
  fetch: boolean;
}

export function detectCapabilities(): RuntimeCapabilities {
  return {
    tlsContext: typeof tls.createSecureContext === 'function',
    fetch: typeof globalThis.fetch === 'function',
  };
}

export interface TransportDependencies {
  logger: Logger;
  gssapi?: GssapiProvider;
  /** Replaces node:net / node:tls connections */
  connector?: SocketConnector;
  /** Replaces the HTTP(S) sender */
  sender?: HttpSender;
  capabilities?: RuntimeCapabilities;
}

/**
 * Render `host:port`, bracketing IPv6 addresses
 */
export function formatHostPort(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * Host name used in the Kerberos service principal: the configured FQDN with
 * any port removed
 */
export function kerberosHostFromFqdn(fqdn: string): string {
  return fqdn.split(':')[0] ?? fqdn;
}

export function selectAuthMode(config: ImpalaClientConfig): AuthMode {
  if (config.useLdap) return 'ldap';
  if (config.jwt !== undefined) return 'jwt';
  if (config.oauth !== undefined) return 'oauth';
  if (config.useKerberos) return 'kerberos';
  // Over HTTP a Kerberos host alias alone turns Kerberos on
  if (config.transport === 'http' && config.kerberosHostFqdn !== undefined) return 'kerberos';
  return 'none';
}

function kerberosHost(config: ImpalaClientConfig): string {
  return config.kerberosHostFqdn !== undefined ? kerberosHostFromFqdn(config.kerberosHostFqdn) : config.host;
}

function requireGssapi(deps: TransportDependencies): GssapiProvider {
  if (!deps.gssapi) {
    throw new NotSupportedError('Kerberos authentication needs a GSSAPI provider');
  }
  return deps.gssapi;
}

function ldapCredentials(config: ImpalaClientConfig): { user: string; password: string } {
  if (config.user === undefined || config.ldapPassword === undefined) {
    throw new ConfigurationError('LDAP authentication needs a user and a password');
  }
  return { user: config.user, password: config.ldapPassword };
}

async function createSaslMechanism(
  mode: AuthMode,
  config: ImpalaClientConfig,
  deps: TransportDependencies
): Promise<SaslMechanism | undefined> {
  switch (mode) {
    case 'none':
      return undefined;
    case 'ldap': {
      const { user, password } = ldapCredentials(config);
      return new PlainMechanism(user, password);
    }
    case 'kerberos':
      return requireGssapi(deps).createSaslMechanism(config.kerberosServiceName, kerberosHost(config));
    case 'jwt':
    case 'oauth':
      throw new NotSupportedError(`${mode.toUpperCase()} authentication is only supported over HTTP`);
  }
}

function createHttpAuth(mode: AuthMode, config: ImpalaClientConfig, deps: TransportDependencies): HttpAuth {
  switch (mode) {
    case 'none':
      return { kind: 'none' };
    case 'ldap':
      return { kind: 'basic', ...ldapCredentials(config) };
    case 'jwt':
      return { kind: 'jwt', token: config.jwt ?? '' };
    case 'oauth':
      return { kind: 'oauth', token: config.oauth ?? '' };
    case 'kerberos':
      return {
        kind: 'kerberos',
        provider: requireGssapi(deps),
        service: config.kerberosServiceName,
        host: kerberosHost(config),
      };
  }
}

/**
 * Build the configured transport without opening it
 *
 * @throws NotSupportedError when the runtime or the transport cannot honour the configuration
 */
export async function createTransport(config: ImpalaClientConfig, deps: TransportDependencies): Promise<Transport> {
  const capabilities = deps.capabilities ?? detectCapabilities();
  const mode = selectAuthMode(config);

  if (config.transport === 'http') {
    if (config.protocol === 'legacy') {
      throw new ConfigurationError('the legacy protocol is only available over socket transports');
    }
    if (config.useTls && !capabilities.tlsContext) {
      throw new NotSupportedError('HTTPS needs TLS context support, which this runtime lacks');
    }
    if (!config.useTls && !deps.sender && !capabilities.fetch) {
      throw new NotSupportedError('HTTP transport needs a fetch implementation');
    }
    if (config.connectTimeoutMs > 0) {
      deps.logger.warn('connect timeout is currently ignored with HTTP transport');
    }

    const scheme = config.useTls ? 'https' : 'http';
    return new HttpTransport({
      url: `${scheme}://${formatHostPort(config.host, config.port)}/${config.httpPath}`,
      auth: createHttpAuth(mode, config, deps),
      cookieNames: config.httpCookieNames,
      socketTimeoutSeconds: config.httpSocketTimeoutSeconds,
      tracing: config.httpTracing,
      forwardedFor: config.forwardedFor,
      sender: deps.sender ?? (config.useTls ? httpsSender(config.caCert) : fetchSender()),
      logger: deps.logger,
    });
  }

  if (config.useTls && !capabilities.tlsContext) {
    throw new NotSupportedError('TLS needs TLS context support, which this runtime lacks');
  }
  return new SocketTransport({
    host: config.host,
    port: config.port,
    tls: config.useTls,
    caCert: config.caCert,
    connectTimeoutMs: config.connectTimeoutMs,
    sasl: await createSaslMechanism(mode, config, deps),
    connector: deps.connector,
  });
}

/**
 * Build and open the configured transport
 */
export async function openTransport(config: ImpalaClientConfig, deps: TransportDependencies): Promise<Transport> {
  const transport = await createTransport(config, deps);
  await transport.open();
  deps.logger.info(`Opened ${transport.kind === 'http' ? 'HTTP' : 'TCP'} connection to ${formatHostPort(config.host, config.port)}`);
  return transport;
}
