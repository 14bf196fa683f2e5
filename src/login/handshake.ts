import { resolveProtocolConfig, type ProtocolConfig, type ProtocolConfigInput } from "../config.js";
import type { DuplexStream } from "../framing/frame.js";
import { MessageStream } from "../framing/messageStream.js";
import {
  normalizeObserver,
  nowSeconds,
  type HandshakeReason,
  type HandshakeRole,
  type ProtocolObserver,
  type ProtocolObserverLike
} from "../observability/observer.js";
import { deadlineFromTimeout, withDeadline } from "../utils/deadline.js";
import { HandshakeError, isAbortError, isStreamEOFError, isTimeoutError } from "../utils/errors.js";
import { checksumSize, type ChecksumSelector } from "./checksum.js";
import { p256Keys, type KeyPair, type KeyProvider } from "./keys.js";
import { ClientHello, ClientReady, Login, ServerHello, type LoginMessage } from "./messages.js";
import { createClientHello, randomI64 } from "./obfuscation.js";
import { HandshakeSession } from "./session.js";

type HandshakeCommonOptions = Readonly<{
  config?: ProtocolConfigInput;
  keys?: KeyProvider;
  observer?: ProtocolObserverLike;
  /** Optional AbortSignal to cancel the handshake. */
  signal?: AbortSignal;
  /** Total handshake timeout in milliseconds (0 disables); defaults to config.handshakeTimeoutMs. */
  timeoutMs?: number;
}>;

export type ClientHandshakeOptions = HandshakeCommonOptions &
  Readonly<{
    /** Source of the integrity value; defaults to randomI64. */
    random?: () => bigint;
    /** Clock in Unix milliseconds; defaults to Date.now. */
    now?: () => number;
  }>;

export type ServerHandshakeOptions = HandshakeCommonOptions &
  Readonly<{
    /** Key that signs the handshake public key; defaults to the handshake key pair itself. */
    signingKey?: KeyPair;
    /** Handshake key pair; generated per connection when absent. */
    keyPair?: KeyPair;
    checksum?: ChecksumSelector;
  }>;

export type ClientHandshakeResult = Readonly<{
  /** SEC1 public key from ServerHello. */
  serverPublicKey: Uint8Array;
  /** DER signature from ServerHello; callers verify it against their trust root. */
  serverSignature: Uint8Array;
  checksum: ChecksumSelector;
  keyPair: KeyPair;
  integrity: bigint;
  /** The login message stream, ready for further use by the caller. */
  messages: MessageStream<LoginMessage>;
}>;

export type ServerHandshakeResult = Readonly<{
  /** SEC1 public key from ClientReady. */
  clientPublicKey: Uint8Array;
  integrity: bigint;
  timestampMillis: bigint;
  checksum: ChecksumSelector;
  keyPair: KeyPair;
  messages: MessageStream<LoginMessage>;
}>;

function classifyHandshakeError(err: unknown): HandshakeReason {
  if (isTimeoutError(err)) return "timeout";
  if (isAbortError(err)) return "canceled";
  if (isStreamEOFError(err)) return "io_error";
  return "protocol_error";
}

class HandshakeRun {
  readonly config: ProtocolConfig;
  readonly keys: KeyProvider;
  readonly observer: ProtocolObserver;
  readonly messages: MessageStream<LoginMessage>;
  private readonly deadlineMs: number | null;
  private readonly started = nowSeconds();

  constructor(
    readonly role: HandshakeRole,
    stream: DuplexStream,
    private readonly opts: HandshakeCommonOptions
  ) {
    this.config = resolveProtocolConfig(opts.config);
    this.keys = opts.keys ?? p256Keys;
    this.observer = normalizeObserver(opts.observer);
    this.messages = new MessageStream(stream, Login, {
      decode: { maxFieldBytes: this.config.maxFieldBytes },
      packet: { checksum: this.config.checksum, encryption: this.config.encryption },
      observer: this.observer
    });
    this.deadlineMs = deadlineFromTimeout(opts.timeoutMs, this.config.handshakeTimeoutMs);
  }

  session(): HandshakeSession {
    return new HandshakeSession(this.role, {
      primaryObfuscation: this.config.primaryObfuscation,
      secondaryObfuscation: this.config.secondaryObfuscation
    });
  }

  async write(message: LoginMessage): Promise<void> {
    await this.bounded(this.messages.writeMessage(message));
  }

  async read(): Promise<LoginMessage> {
    return await this.bounded(this.messages.readMessage());
  }

  assertPublicKey(publicKey: Uint8Array, who: string): void {
    if (!this.keys.isValidPublicKey(publicKey)) throw new HandshakeError("invalid_public_key", `${who} public key is not a valid point`);
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    try {
      const out = await fn();
      this.observer.onHandshake(this.role, "ok", undefined, nowSeconds() - this.started);
      return out;
    } catch (e) {
      this.observer.onHandshake(this.role, "fail", classifyHandshakeError(e), nowSeconds() - this.started);
      throw e;
    }
  }

  private bounded<T>(p: Promise<T>): Promise<T> {
    const signal = this.opts.signal;
    return withDeadline(p, this.deadlineMs, {
      ...(signal !== undefined ? { signal } : {}),
      onCancel: () => this.messages.close()
    });
  }
}

// clientHandshake sends ClientHello, reads ServerHello and answers with ClientReady.
//
// The server signature is returned unverified; see verifyServerHello.
export async function clientHandshake(stream: DuplexStream, opts: ClientHandshakeOptions = {}): Promise<ClientHandshakeResult> {
  const run = new HandshakeRun("client", stream, opts);
  return await run.run(async () => {
    const session = run.session();
    const random = opts.random ?? randomI64;
    const now = opts.now ?? Date.now;
    const integrity = random();
    const hello = createClientHello({
      integrity,
      timestampMillis: BigInt(Math.floor(now())),
      primary: run.config.primaryObfuscation,
      secondary: run.config.secondaryObfuscation
    });
    await run.write(ClientHello.wrap(session.sendClientHello(hello)));

    session.receive(await run.read());
    const done = session.result;
    if (done == null || done.serverSignature == null) throw new HandshakeError("unexpected_message", "ServerHello missing");
    run.assertPublicKey(done.peerPublicKey, "server");

    const keyPair = run.keys.generateKeyPair();
    await run.write(ClientReady.wrap(session.sendClientReady({ publicKey: keyPair.publicKey })));

    return {
      serverPublicKey: done.peerPublicKey,
      serverSignature: done.serverSignature,
      checksum: done.checksum,
      keyPair,
      integrity,
      messages: run.messages
    };
  });
}

// serverHandshake reads ClientHello, answers with a signed ServerHello and waits for ClientReady.
export async function serverHandshake(stream: DuplexStream, opts: ServerHandshakeOptions = {}): Promise<ServerHandshakeResult> {
  const run = new HandshakeRun("server", stream, opts);
  return await run.run(async () => {
    const session = run.session();
    session.receive(await run.read());
    const integrity = session.integrity();
    const timestampMillis = session.timestampMillis();
    if (integrity == null || timestampMillis == null) throw new HandshakeError("unexpected_message", "ClientHello missing");

    const keyPair = opts.keyPair ?? run.keys.generateKeyPair();
    const signingKey = opts.signingKey ?? keyPair;
    const checksum: ChecksumSelector = opts.checksum ?? { kind: "none" };
    const hello = session.sendServerHello({
      publicKey: keyPair.publicKey,
      signature: run.keys.sign(signingKey.secretKey, keyPair.publicKey),
      checksumSize: checksumSize(checksum)
    });
    await run.write(ServerHello.wrap(hello));

    session.receive(await run.read());
    const done = session.result;
    if (done == null) throw new HandshakeError("unexpected_message", "ClientReady missing");
    run.assertPublicKey(done.peerPublicKey, "client");

    return { clientPublicKey: done.peerPublicKey, integrity, timestampMillis, checksum: done.checksum, keyPair, messages: run.messages };
  });
}

// verifyServerHello checks the ServerHello signature over its public key against a trusted key.
export function verifyServerHello(hello: ServerHello, trustedPublicKey: Uint8Array, keys: KeyProvider = p256Keys): boolean {
  return keys.verify(trustedPublicKey, hello.publicKey, hello.signature);
}
