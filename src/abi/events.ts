import { EventFragment } from 'ethers';
import { EventKind } from '../core/types.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Parameter shape each event kind must have. Names are free, types and
 * indexing are fixed so the decoder can read every kind without a schema.
 */
const EVENT_SHAPES: Record<EventKind, { indexed: string[]; data: string[] }> = {
  Transfer: { indexed: ['address', 'address'], data: ['uint256'] },
  Approval: { indexed: ['address', 'address'], data: ['uint256'] },
  Mint: { indexed: ['address'], data: ['uint256'] },
  Burn: { indexed: ['address'], data: ['uint256'] },
};

/**
 * Signatures emitted by the deployed PYUSD contract. Supply changes are
 * reported as SupplyIncreased/SupplyDecreased, not Mint/Burn.
 */
export const DEFAULT_EVENT_SIGNATURES: Record<EventKind, string> = {
  Transfer: 'Transfer(address indexed from, address indexed to, uint256 value)',
  Approval: 'Approval(address indexed owner, address indexed spender, uint256 value)',
  Mint: 'SupplyIncreased(address indexed to, uint256 value)',
  Burn: 'SupplyDecreased(address indexed from, uint256 value)',
};

export interface EventLayout {
  kind: EventKind;
  name: string;
  signature: string;
  topicHash: string;
  indexedCount: number;
  dataCount: number;
}

export type EventLayouts = Record<EventKind, EventLayout>;

export type EventSignatureOverrides = Partial<Record<EventKind, string>>;

function parseFragment(kind: EventKind, signature: string): EventFragment {
  const source = signature.trim().startsWith('event ') ? signature : `event ${signature}`;

  try {
    return EventFragment.from(source);
  } catch (error) {
    throw new ConfigError(
      `Invalid ${kind} event signature "${signature}": ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function buildEventLayout(kind: EventKind, signature: string): EventLayout {
  const fragment = parseFragment(kind, signature);
  const shape = EVENT_SHAPES[kind];

  if (fragment.anonymous) {
    throw new ConfigError(`${kind} event signature must not be anonymous`);
  }

  const indexed = fragment.inputs.filter(input => input.indexed === true).map(input => input.type);
  const data = fragment.inputs.filter(input => input.indexed !== true).map(input => input.type);

  if (indexed.join(',') !== shape.indexed.join(',') || data.join(',') !== shape.data.join(',')) {
    throw new ConfigError(
      `${kind} event signature "${signature}" does not match the expected layout: ` +
      `indexed (${shape.indexed.join(', ')}), data (${shape.data.join(', ')})`
    );
  }

  return {
    kind,
    name: fragment.name,
    signature: fragment.format('sighash'),
    topicHash: fragment.topicHash,
    indexedCount: indexed.length,
    dataCount: data.length,
  };
}

export function buildEventLayouts(overrides: EventSignatureOverrides = {}): EventLayouts {
  const layout = (kind: EventKind) =>
    buildEventLayout(kind, overrides[kind] ?? DEFAULT_EVENT_SIGNATURES[kind]);

  return {
    Transfer: layout('Transfer'),
    Mint: layout('Mint'),
    Burn: layout('Burn'),
    Approval: layout('Approval'),
  };
}
