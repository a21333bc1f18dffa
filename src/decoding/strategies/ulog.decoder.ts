import { Injectable, Logger } from '@nestjs/common';
import { CorruptFormatError } from '../../common/errors';
import {
  DecodeOptions,
  ILogDecoder,
  Sample,
} from '../interfaces/decoder.interface';

type PrimitiveType =
  | 'int8_t'
  | 'uint8_t'
  | 'int16_t'
  | 'uint16_t'
  | 'int32_t'
  | 'uint32_t'
  | 'int64_t'
  | 'uint64_t'
  | 'float'
  | 'double'
  | 'bool'
  | 'char';

const PRIMITIVE_SIZES: Record<PrimitiveType, number> = {
  int8_t: 1,
  uint8_t: 1,
  int16_t: 2,
  uint16_t: 2,
  int32_t: 4,
  uint32_t: 4,
  int64_t: 8,
  uint64_t: 8,
  float: 4,
  double: 8,
  bool: 1,
  char: 1,
};

function isPrimitive(type: string): type is PrimitiveType {
  return Object.prototype.hasOwnProperty.call(PRIMITIVE_SIZES, type);
}

interface FieldDef {
  type: string;
  arrayLength: number | null;
  name: string;
}

/** One numeric value at a fixed offset inside a data payload */
interface FieldReader {
  key: string;
  offset: number;
  type: PrimitiveType;
}

interface MessageLayout {
  readers: FieldReader[];
  timestampOffset: number;
  /** Smallest payload that holds every reader (trailing padding may be cut) */
  minSize: number;
}

interface Subscription {
  topic: string;
  instance: number;
  /** null when the topic is filtered out */
  layout: MessageLayout | null;
}

/**
 * ULog Streaming Decoder Strategy
 *
 * Decodes PX4 ULog binaries incrementally, one message at a time.
 *
 * File Structure:
 * - 16-byte header: magic "ULog" 0x01 0x12 0x35, version, uint64 timestamp
 * - Messages: uint16 size, uint8 type, `size` bytes of payload
 *
 * Message types used here:
 * - 'F' format: "topic:type field;type field;..."
 * - 'A' subscription: uint8 multi_id, uint16 msg_id, topic name
 * - 'D' data: uint16 msg_id followed by the packed struct
 *
 * Everything else (info, parameters, logged strings, sync, dropouts) is
 * skipped by size. A log cut off mid-message (power loss) ends cleanly at
 * the last complete message.
 */
@Injectable()
export class ULogDecoder implements ILogDecoder {
  private readonly logger = new Logger(ULogDecoder.name);

  readonly name = 'ulog';
  readonly description = 'PX4 ULog binary flight log';
  readonly extensions = ['.ulg', '.ulog'] as const;

  /**
   * "ULog" followed by 0x01 0x12 0x35
   */
  private readonly MAGIC = Buffer.from([0x55, 0x4c, 0x6f, 0x67, 0x01, 0x12, 0x35]);
  private readonly HEADER_SIZE = 16;
  private readonly MESSAGE_HEADER_SIZE = 3;
  private readonly MAX_NESTING = 16;

  canHandle(_identifier: string, head: Buffer): boolean {
    return (
      head.length >= this.MAGIC.length &&
      head.subarray(0, this.MAGIC.length).equals(this.MAGIC)
    );
  }

  async *decode(
    chunks: AsyncIterable<Buffer>,
    options: DecodeOptions = {},
  ): AsyncGenerator<Sample> {
    const formats = new Map<string, FieldDef[]>();
    const subscriptions = new Map<number, Subscription>();
    let pending: Buffer = Buffer.alloc(0);
    let offset = 0;
    let headerRead = false;
    let unknownIds = 0;
    let samples = 0;

    for await (const chunk of chunks) {
      pending =
        offset < pending.length
          ? Buffer.concat([pending.subarray(offset), chunk])
          : chunk;
      offset = 0;

      if (!headerRead) {
        if (pending.length < this.HEADER_SIZE) {
          continue;
        }
        if (!this.canHandle('', pending)) {
          throw new CorruptFormatError(this.name, 'Missing ULog magic bytes');
        }
        offset = this.HEADER_SIZE;
        headerRead = true;
      }

      while (pending.length - offset >= this.MESSAGE_HEADER_SIZE) {
        const size = pending.readUInt16LE(offset);
        const end = offset + this.MESSAGE_HEADER_SIZE + size;
        if (end > pending.length) {
          break;
        }

        const type = String.fromCharCode(pending[offset + 2]);
        const payload = pending.subarray(offset + this.MESSAGE_HEADER_SIZE, end);
        offset = end;

        switch (type) {
          case 'F':
            this.readFormat(payload, formats);
            break;
          case 'A':
            this.readSubscription(payload, formats, subscriptions, options);
            break;
          case 'D': {
            if (payload.length < 2) {
              throw new CorruptFormatError(this.name, 'Data message too short');
            }
            const subscription = subscriptions.get(payload.readUInt16LE(0));
            if (!subscription) {
              unknownIds++;
              break;
            }
            if (subscription.layout) {
              samples++;
              yield this.readSample(subscription, subscription.layout, payload.subarray(2));
            }
            break;
          }
          default:
            break;
        }
      }
    }

    if (!headerRead) {
      throw new CorruptFormatError(this.name, 'Truncated ULog header');
    }
    if (subscriptions.size === 0) {
      throw new CorruptFormatError(this.name, 'ULog contains no logged topics');
    }
    if (pending.length > offset) {
      this.logger.debug(
        `Ignoring ${pending.length - offset} trailing byte(s) of a truncated message`,
      );
    }
    if (unknownIds > 0) {
      this.logger.debug(`Skipped ${unknownIds} data message(s) with unknown ids`);
    }
    this.logger.debug(`Decoded ${samples} sample(s) from ${subscriptions.size} subscription(s)`);
  }

  /**
   * Parse "topic:type field;type field;" into the format table
   */
  private readFormat(payload: Buffer, formats: Map<string, FieldDef[]>): void {
    const text = payload.toString('latin1');
    const colon = text.indexOf(':');
    if (colon <= 0) {
      throw new CorruptFormatError(this.name, `Malformed format definition "${text}"`);
    }

    const name = text.slice(0, colon);
    const fields = text
      .slice(colon + 1)
      .split(';')
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map((part) => this.parseFieldDef(name, part));

    formats.set(name, fields);
  }

  private parseFieldDef(formatName: string, spec: string): FieldDef {
    const match = /^([A-Za-z0-9_]+)(?:\[(\d+)\])?\s+([A-Za-z0-9_]+)$/.exec(spec);
    if (!match) {
      throw new CorruptFormatError(
        this.name,
        `Malformed field "${spec}" in format ${formatName}`,
      );
    }
    return {
      type: match[1],
      arrayLength: match[2] === undefined ? null : Number(match[2]),
      name: match[3],
    };
  }

  private readSubscription(
    payload: Buffer,
    formats: Map<string, FieldDef[]>,
    subscriptions: Map<number, Subscription>,
    options: DecodeOptions,
  ): void {
    if (payload.length < 4) {
      throw new CorruptFormatError(this.name, 'Subscription message too short');
    }
    const instance = payload.readUInt8(0);
    const msgId = payload.readUInt16LE(1);
    const topic = payload.subarray(3).toString('latin1');

    if (options.topics && !options.topics.has(topic)) {
      subscriptions.set(msgId, { topic, instance, layout: null });
      return;
    }

    subscriptions.set(msgId, {
      topic,
      instance,
      layout: this.compileLayout(topic, formats),
    });
  }

  /**
   * Flatten a (possibly nested) format into fixed-offset readers.
   */
  private compileLayout(
    topic: string,
    formats: Map<string, FieldDef[]>,
  ): MessageLayout {
    const readers: FieldReader[] = [];
    this.appendReaders(topic, '', 0, formats, readers, 0);

    const timestamp = readers.find((reader) => reader.key === 'timestamp');
    if (!timestamp || timestamp.type !== 'uint64_t') {
      throw new CorruptFormatError(
        this.name,
        `Format ${topic} has no uint64_t timestamp field`,
      );
    }

    const values = readers.filter((reader) => reader !== timestamp);
    const minSize = readers.reduce(
      (max, reader) => Math.max(max, reader.offset + PRIMITIVE_SIZES[reader.type]),
      0,
    );

    return { readers: values, timestampOffset: timestamp.offset, minSize };
  }

  /**
   * @returns the packed size of `formatName`
   */
  private appendReaders(
    formatName: string,
    prefix: string,
    baseOffset: number,
    formats: Map<string, FieldDef[]>,
    readers: FieldReader[],
    depth: number,
  ): number {
    if (depth > this.MAX_NESTING) {
      throw new CorruptFormatError(this.name, `Format nesting too deep at ${formatName}`);
    }
    const fields = formats.get(formatName);
    if (!fields) {
      throw new CorruptFormatError(this.name, `Unknown format ${formatName}`);
    }

    let offset = baseOffset;
    for (const field of fields) {
      const count = field.arrayLength ?? 1;
      const padding = field.name.startsWith('_padding');

      for (let i = 0; i < count; i++) {
        const key =
          field.arrayLength === null
            ? `${prefix}${field.name}`
            : `${prefix}${field.name}[${i}]`;

        if (isPrimitive(field.type)) {
          if (!padding && field.type !== 'char') {
            readers.push({ key, offset, type: field.type });
          }
          offset += PRIMITIVE_SIZES[field.type];
        } else {
          offset += this.appendReaders(
            field.type,
            `${key}.`,
            offset,
            formats,
            padding ? [] : readers,
            depth + 1,
          );
        }
      }
    }
    return offset - baseOffset;
  }

  private readSample(
    subscription: Subscription,
    layout: MessageLayout,
    data: Buffer,
  ): Sample {
    if (data.length < layout.minSize) {
      throw new CorruptFormatError(
        this.name,
        `Data for ${subscription.topic} is ${data.length} bytes, expected at least ${layout.minSize}`,
      );
    }

    const values: Record<string, number> = {};
    for (const reader of layout.readers) {
      values[reader.key] = readValue(data, reader.offset, reader.type);
    }

    return {
      topic: subscription.topic,
      instance: subscription.instance,
      timestampUs: Number(data.readBigUInt64LE(layout.timestampOffset)),
      values,
    };
  }
}

function readValue(data: Buffer, offset: number, type: PrimitiveType): number {
  switch (type) {
    case 'int8_t':
      return data.readInt8(offset);
    case 'uint8_t':
    case 'char':
      return data.readUInt8(offset);
    case 'bool':
      return data.readUInt8(offset) === 0 ? 0 : 1;
    case 'int16_t':
      return data.readInt16LE(offset);
    case 'uint16_t':
      return data.readUInt16LE(offset);
    case 'int32_t':
      return data.readInt32LE(offset);
    case 'uint32_t':
      return data.readUInt32LE(offset);
    case 'int64_t':
      return Number(data.readBigInt64LE(offset));
    case 'uint64_t':
      return Number(data.readBigUInt64LE(offset));
    case 'float':
      return data.readFloatLE(offset);
    case 'double':
      return data.readDoubleLE(offset);
  }
}
