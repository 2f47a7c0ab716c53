import { MaxUint256, ZeroAddress, dataLength, dataSlice, getAddress, isHexString, toBigInt } from 'ethers';
import { DecodedEvent, EventKind, LogEntry } from '../core/types.js';
import { DecodeError } from '../utils/errors.js';
import { EventLayout, EventLayouts, buildEventLayouts } from './events.js';

const WORD_SIZE = 32;
const ADDRESS_PADDING = `0x${'00'.repeat(12)}`;

interface DecodedFields {
  contractAddress: string;
  blockNumber: number;
  transactionHash: string;
  logIndex: number;
  addresses: string[];
  amount: bigint;
}

/**
 * One decode function per event kind. Mint and Burn carry a single indexed
 * party, the other side is the zero address.
 */
const DECODERS: { [K in EventKind]: (fields: DecodedFields) => Extract<DecodedEvent, { kind: K }> } = {
  Transfer: ({ addresses: [from, to], ...fields }) => ({
    kind: 'Transfer',
    ...fields,
    fromAddress: from,
    toAddress: to,
  }),
  Approval: ({ addresses: [owner, spender], ...fields }) => ({
    kind: 'Approval',
    ...fields,
    fromAddress: owner,
    toAddress: spender,
    unlimited: fields.amount === MaxUint256,
  }),
  Mint: ({ addresses: [to], ...fields }) => ({
    kind: 'Mint',
    ...fields,
    fromAddress: ZeroAddress,
    toAddress: to,
  }),
  Burn: ({ addresses: [from], ...fields }) => ({
    kind: 'Burn',
    ...fields,
    fromAddress: from,
    toAddress: ZeroAddress,
  }),
};

export class EventDecoder {
  constructor(private readonly layouts: EventLayouts = buildEventLayouts()) {}

  layout(kind: EventKind): EventLayout {
    return this.layouts[kind];
  }

  /**
   * Topic hash the log query filters on for this kind
   */
  topicFor(kind: EventKind): string {
    return this.layouts[kind].topicHash;
  }

  /**
   * Decodes a log against the fixed layout of `kind`.
   * @throws DecodeError when topics or data do not fit the layout
   */
  decode(kind: EventKind, log: LogEntry): DecodedEvent {
    const layout = this.layouts[kind];
    const fail = (reason: string) =>
      new DecodeError(
        `Cannot decode ${layout.name} log ${log.transactionHash}#${log.logIndex}: ${reason}`,
        {
          kind,
          blockNumber: log.blockNumber,
          transactionHash: log.transactionHash,
          logIndex: log.logIndex,
        }
      );

    const [signatureTopic, ...indexedTopics] = log.topics;

    if (signatureTopic === undefined) {
      throw fail('log has no topics');
    }

    if (signatureTopic.toLowerCase() !== layout.topicHash) {
      throw fail(`topic ${signatureTopic} does not match ${layout.signature}`);
    }

    if (indexedTopics.length !== layout.indexedCount) {
      throw fail(`expected ${layout.indexedCount} indexed topics, got ${indexedTopics.length}`);
    }

    const expectedDataLength = WORD_SIZE * layout.dataCount;
    if (!isHexString(log.data, true)) {
      throw fail('data is not a hex byte string');
    }
    if (dataLength(log.data) !== expectedDataLength) {
      throw fail(`expected ${expectedDataLength} bytes of data, got ${dataLength(log.data)}`);
    }

    const addresses = indexedTopics.map(topic => {
      if (!isHexString(topic, WORD_SIZE) || dataSlice(topic, 0, 12) !== ADDRESS_PADDING) {
        throw fail(`topic ${topic} is not an encoded address`);
      }
      return getAddress(dataSlice(topic, 12));
    });

    const event = DECODERS[kind]({
      contractAddress: log.address,
      blockNumber: log.blockNumber,
      transactionHash: log.transactionHash,
      logIndex: log.logIndex,
      addresses,
      amount: toBigInt(dataSlice(log.data, 0, WORD_SIZE)),
    });

    return Object.freeze(event);
  }
}
