/**
 * @modegreet/ipc
 *
 * Client side of the greetd IPC protocol.
 */

export * from './types.js';
export * from './constants.js';
export * from './errors.js';
export { GreetdRequestSchema, GreetdResponseSchema } from './schemas.js';
export { encodeFrame, decodeResponse, FrameDecoder } from './codec.js';
export {
  SocketTransport,
  DemoTransport,
  DEMO_PASSWORD,
  type Transport,
  type SocketTransportOptions,
} from './transport.js';
export { GreetdClient, toAuthExchange, type GreetdClientOptions } from './client.js';
