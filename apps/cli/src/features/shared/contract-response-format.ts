import type { ContractResponse } from '@ftgate/contract';
import pc from 'picocolors';

/**
 * Text rendering of an instantiate/execute response: one attribute per line,
 * then each outbound message as compact JSON.
 */
export function formatContractResponse(response: ContractResponse): string {
  const lines = response.attributes.map((attr) => `${pc.bold(attr.key)}: ${attr.value}`);

  if (response.messages.length === 0) {
    lines.push(pc.dim('no messages'));
  } else {
    lines.push(`${pc.bold('messages')}:`);
    for (const message of response.messages) {
      lines.push(`  ${JSON.stringify(message)}`);
    }
  }

  return lines.join('\n');
}
