export { connectTcp, listenTcp, SocketStream } from "./tcp.js";
export type { ConnectTcpOptions, ListenTcpOptions } from "./tcp.js";
