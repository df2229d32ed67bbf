import type { InstantiateCommandOptions } from '../shared/schemas.js';

/**
 * Build the raw instantiate message from validated command flags. The message
 * itself is validated by the contract host.
 */
export function buildInstantiateMsgFromFlags(options: InstantiateCommandOptions): Record<string, unknown> {
  const msg: Record<string, unknown> = {
    symbol: options.symbol,
    subunit: options.subunit,
    precision: options.precision,
    initialAmount: options.initialAmount,
  };

  if (options.description !== undefined) msg['description'] = options.description;
  if (options.features !== undefined) {
    msg['features'] = options.features
      .split(',')
      .map((feature) => feature.trim())
      .filter((feature) => feature.length > 0);
  }
  if (options.burnRate !== undefined) msg['burnRate'] = options.burnRate;
  if (options.sendCommissionRate !== undefined) msg['sendCommissionRate'] = options.sendCommissionRate;
  if (options.uri !== undefined) msg['uri'] = options.uri;
  if (options.uriHash !== undefined) msg['uriHash'] = options.uriHash;

  return msg;
}
