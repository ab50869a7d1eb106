import { DecodeError } from './errors'

const utf8 = new TextDecoder('utf-8', { fatal: true })

export function decodeUtf8(bytes: Uint8Array, offset?: number): string {
  try {
    return utf8.decode(bytes)
  } catch (error) {
    throw new DecodeError('malformed-string', 'String is not valid UTF-8', { offset, cause: error })
  }
}

/**
 * Sequential little-endian reader over an immutable buffer. Every read is
 * bounds-checked and throws DecodeError('truncated-data') instead of reading
 * past the end.
 */
export class BinaryCursor {
  readonly #bytes: Uint8Array
  readonly #view: DataView
  #offset = 0

  constructor(bytes: Uint8Array) {
    this.#bytes = bytes
    this.#view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get position(): number {
    return this.#offset
  }

  get length(): number {
    return this.#bytes.byteLength
  }

  remaining(): number {
    return this.#bytes.byteLength - this.#offset
  }

  atEnd(): boolean {
    return this.remaining() === 0
  }

  readU8(): number {
    const at = this.#take(1)
    return this.#view.getUint8(at)
  }

  readU16(): number {
    const at = this.#take(2)
    return this.#view.getUint16(at, true)
  }

  readU24(): number {
    const at = this.#take(3)
    return this.#view.getUint16(at, true) | (this.#view.getUint8(at + 2) << 16)
  }

  readU32(): number {
    const at = this.#take(4)
    return this.#view.getUint32(at, true)
  }

  /** Returns a view into the underlying buffer, not a copy */
  readFixedBytes(count: number): Uint8Array {
    const at = this.#take(count)
    return this.#bytes.subarray(at, at + count)
  }

  /**
   * 7-bit encoded length: one byte while the high bit is clear, a second byte
   * when it is set. Longer prefixes are rejected.
   */
  readStringLength(): number {
    const start = this.#offset
    const first = this.readU8()
    if ((first & 0x80) === 0) return first

    const second = this.readU8()
    if ((second & 0x80) !== 0) {
      throw new DecodeError('malformed-string', 'String length prefix is longer than two bytes', {
        offset: start,
      })
    }
    return (first & 0x7f) | (second << 7)
  }

  readLengthPrefixed(): Uint8Array {
    const length = this.readStringLength()
    return this.readFixedBytes(length)
  }

  readLengthPrefixedString(): string {
    const start = this.#offset
    return decodeUtf8(this.readLengthPrefixed(), start)
  }

  #take(count: number): number {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Invalid read width ${count}`)
    }
    const at = this.#offset
    if (this.remaining() < count) {
      throw new DecodeError(
        'truncated-data',
        `Needed ${count} byte(s) at offset ${at} but only ${this.remaining()} remain`,
        { offset: at },
      )
    }
    this.#offset = at + count
    return at
  }
}
