/**
 * Transport layer module.
 *
 * Usage:
 * ```typescript
 * import { LocalTransport, type Delivery } from './transport/index.js';
 *
 * const transport = new LocalTransport();
 * await transport.start();
 * const result = await transport.deliver(envelope, targetRecord);
 * await transport.stop();
 * ```
 */

export * from './types.js';
export { LocalTransport } from './local-transport.js';
