/**
 * @lakehouse/impala - Transport Types
 */

/**
 * Per-call attribution, threaded from the dispatcher into the transport
 */
export interface RpcCallContext {
  /** Remote method name */
  readonly method: string;
  /** Correlation id, `{base}-{seq}` */
  readonly requestId: string;
  /** 1-based attempt number */
  readonly attempt: number;
  /** Rendered session id, null when there is no session */
  readonly sessionId: string | null;
  /** Rendered id of the query the call concerns, null when none */
  readonly queryId: string | null;
  /** True once the caller asked for the current query to be cancelled */
  readonly isCancelled: () => boolean;
}

/**
 * Decodes a complete reply from the front of `bytes`. Throws
 * InputBufferUnderrunError while the reply is incomplete.
 */
export type ReplyDecoder<T> = (bytes: Buffer) => { value: T; bytesRead: number };

/**
 * An open, authenticated byte stream that carries one call at a time
 */
export interface Transport {
  readonly kind: 'socket' | 'http';
  /** Only request/response transports can safely resend a call */
  readonly supportsRetries: boolean;
  isOpen(): boolean;
  open(): Promise<void>;
  /**
   * Send one encoded call and resolve with its decoded reply
   */
  call<T>(payload: Buffer, decode: ReplyDecoder<T>, context: RpcCallContext): Promise<T>;
  close(): Promise<void>;
}

/**
 * A SASL client mechanism
 */
export interface SaslMechanism {
  readonly name: string;
  initialResponse(): Promise<Uint8Array>;
  /** Answer a server challenge */
  step(challenge: Uint8Array): Promise<Uint8Array>;
}

/**
 * Source of Kerberos credentials. Implementations wrap a GSSAPI binding.
 */
export interface GssapiProvider {
  /** Start a SASL GSSAPI exchange for `service@host` */
  createSaslMechanism(service: string, host: string): Promise<SaslMechanism>;
  /** Produce a base64 token for an HTTP `Negotiate` header for `service@host` */
  negotiateToken(service: string, host: string): Promise<string>;
}
