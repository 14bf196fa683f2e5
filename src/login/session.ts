import type { HandshakeRole } from "../observability/observer.js";
import { HandshakeError } from "../utils/errors.js";
import { checksumSelector, type ChecksumSelector } from "./checksum.js";
import type { LoginMessage, ClientHello, ClientReady, ServerHello } from "./messages.js";
import { clientHelloIntegrity, clientHelloTimestamp } from "./obfuscation.js";

// Client: start -> awaiting_server_hello -> complete.
// Server: start -> client_hello_received -> awaiting_client_ready -> complete.
export type HandshakePhase = "start" | "awaiting_server_hello" | "client_hello_received" | "awaiting_client_ready" | "complete";

// CompletedHandshake is what a finished session knows about its peer.
export type CompletedHandshake = Readonly<{
  /** SEC1 public key of the peer. */
  peerPublicKey: Uint8Array;
  checksum: ChecksumSelector;
  /** DER signature sent by the server; the client side only. Not verified here. */
  serverSignature?: Uint8Array;
}>;

export type HandshakeSessionOptions = Readonly<{
  primaryObfuscation: bigint;
  secondaryObfuscation: bigint;
}>;

// HandshakeSession enforces message order for one connection.
export class HandshakeSession {
  private phaseValue: HandshakePhase = "start";
  private clientHello: ClientHello | null = null;
  private serverHello: ServerHello | null = null;
  private completed: CompletedHandshake | null = null;
  private clientReadySent = false;

  constructor(
    readonly role: HandshakeRole,
    private readonly opts: HandshakeSessionOptions
  ) {}

  get phase(): HandshakePhase {
    return this.phaseValue;
  }

  // result returns the completed handshake or null while in progress.
  get result(): CompletedHandshake | null {
    return this.completed;
  }

  // integrity is the de-obfuscated ClientHello integrity value once a hello has been seen.
  integrity(): bigint | null {
    if (this.clientHello == null) return null;
    return clientHelloIntegrity(this.clientHello, this.opts.primaryObfuscation);
  }

  // timestampMillis is the de-obfuscated ClientHello timestamp once a hello has been seen.
  timestampMillis(): bigint | null {
    if (this.clientHello == null) return null;
    return clientHelloTimestamp(this.clientHello, this.opts.primaryObfuscation, this.opts.secondaryObfuscation);
  }

  sendClientHello(hello: ClientHello): ClientHello {
    this.expect("client", "start", "ClientHello");
    this.clientHello = hello;
    this.phaseValue = "awaiting_server_hello";
    return hello;
  }

  receiveClientHello(hello: ClientHello): void {
    if (this.role === "server" && this.phaseValue !== "start") {
      throw new HandshakeError("already_progressed", `ClientHello received in phase ${this.phaseValue}`);
    }
    this.expect("server", "start", "ClientHello");
    this.clientHello = hello;
    this.phaseValue = "client_hello_received";
  }

  sendServerHello(hello: ServerHello): ServerHello {
    this.expect("server", "client_hello_received", "ServerHello");
    // Reject a selector the peer could not decode.
    checksumSelector(hello.checksumSize);
    this.serverHello = hello;
    this.phaseValue = "awaiting_client_ready";
    return hello;
  }

  receiveServerHello(hello: ServerHello): CompletedHandshake {
    this.expect("client", "awaiting_server_hello", "ServerHello");
    const checksum = checksumSelector(hello.checksumSize);
    this.serverHello = hello;
    this.completed = { peerPublicKey: hello.publicKey, checksum, serverSignature: hello.signature };
    this.phaseValue = "complete";
    return this.completed;
  }

  sendClientReady(ready: ClientReady): ClientReady {
    this.expect("client", "complete", "ClientReady");
    if (this.clientReadySent) throw new HandshakeError("unexpected_message", "ClientReady already sent");
    this.clientReadySent = true;
    return ready;
  }

  receiveClientReady(ready: ClientReady): CompletedHandshake {
    this.expect("server", "awaiting_client_ready", "ClientReady");
    const serverHello = this.serverHello;
    if (serverHello == null) throw new HandshakeError("unexpected_message", "ClientReady before ServerHello");
    this.completed = { peerPublicKey: ready.publicKey, checksum: checksumSelector(serverHello.checksumSize) };
    this.phaseValue = "complete";
    return this.completed;
  }

  // receive dispatches an incoming Login message to the matching transition.
  receive(message: LoginMessage): void {
    switch (message.type) {
      case "ClientHello":
        this.receiveClientHello(message.value);
        return;
      case "ServerHello":
        this.receiveServerHello(message.value);
        return;
      case "ClientReady":
        this.receiveClientReady(message.value);
        return;
    }
  }

  private expect(role: HandshakeRole, phase: HandshakePhase, what: string): void {
    if (this.role !== role) throw new HandshakeError("unexpected_message", `${what} is not valid for the ${this.role} side`);
    if (this.phaseValue !== phase) throw new HandshakeError("unexpected_message", `${what} not expected in phase ${this.phaseValue}`);
  }
}
