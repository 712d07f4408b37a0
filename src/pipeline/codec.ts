import { Codec } from './types';
import { SerializationError } from '../cache/errors';

/** UTF-8 JSON payloads */
export function jsonCodec<T>(): Codec<T> {
  return {
    encode(value: T): Buffer {
      let text: string | undefined;
      try {
        text = JSON.stringify(value);
      } catch (err) {
        throw new SerializationError('Failed to serialize value', { cause: err });
      }
      if (text === undefined) {
        throw new SerializationError(`Value of type ${typeof value} has no JSON form`);
      }
      return Buffer.from(text, 'utf8');
    },

    decode(payload: Buffer): T {
      try {
        const value: T = JSON.parse(payload.toString('utf8'));
        return value;
      } catch (err) {
        throw new SerializationError('Failed to deserialize value', { cause: err });
      }
    },
  };
}
