/**
 * Decoder for the ByteTree binary serialization format
 *
 * Layout: a little-endian u32 protocol version, then the root value. Every
 * value starts with a u32 header. With the high bit set the value is an
 * object and the low 31 bits count its fields; otherwise it is a scalar of
 * that many bytes. Node objects are
 *
 *   [tag u8, id u32, ...]                         tag 2: omitted node
 *   [0, id, presence u8, tokenKind, text, leadingTrivia, trailingTrivia]
 *   [1, id, presence u8, kind, children]
 *
 * Strings are UTF-8 scalars, trivia pieces are [kind, count u32, text] and a
 * child object with no fields marks an absent child. Fields past the ones
 * listed are skipped so newer writers stay readable. Nothing may follow the
 * root node.
 */

import {
  isCountedTriviaKind,
  isTextualTriviaKind,
  type RawSyntax,
  type SourcePresence,
  type TriviaPiece,
} from '../types/Syntax.js';
import { DeserializationError } from './errors.js';
import type { OmittedNodeLookup } from './jsonDecoder.js';
import { lookupTokenKind } from './tokenKinds.js';

export const BYTE_TREE_PROTOCOL_VERSION = 1;

const OBJECT_FLAG = 0x80000000;

const NODE_TAG_TOKEN = 0;
const NODE_TAG_LAYOUT = 1;
const NODE_TAG_OMITTED = 2;

const TOKEN_FIELD_COUNT = 7;
const LAYOUT_FIELD_COUNT = 5;
const TRIVIA_FIELD_COUNT = 3;

class ByteTreeReader {
  private offset = 0;
  private readonly view: DataView;
  private readonly utf8 = new TextDecoder('utf-8', { fatal: true });

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get remaining(): number {
    return this.data.byteLength - this.offset;
  }

  get position(): string {
    return `byte ${this.offset}`;
  }

  fail(message: string): never {
    throw new DeserializationError(this.position, message);
  }

  readU32(): number {
    if (this.offset + 4 > this.data.byteLength) {
      this.fail('unexpected end of data');
    }
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  /** Reads an object header and returns its field count */
  readObjectHeader(): number {
    const header = this.readU32();
    if ((header & OBJECT_FLAG) === 0) {
      this.offset -= 4;
      this.fail(`expected an object, found a scalar of ${header} bytes`);
    }
    return header & ~OBJECT_FLAG;
  }

  readScalar(): Uint8Array {
    const header = this.readU32();
    if ((header & OBJECT_FLAG) !== 0) {
      this.offset -= 4;
      this.fail(`expected a scalar, found an object with ${header & ~OBJECT_FLAG} fields`);
    }
    if (this.offset + header > this.data.byteLength) {
      this.fail(`scalar of ${header} bytes runs past the end of data`);
    }
    const bytes = this.data.subarray(this.offset, this.offset + header);
    this.offset += header;
    return bytes;
  }

  readU8Scalar(): number {
    const bytes = this.readScalar();
    if (bytes.byteLength !== 1) {
      this.fail(`expected a 1-byte scalar, found ${bytes.byteLength} bytes`);
    }
    return bytes[0];
  }

  readU32Scalar(): number {
    const bytes = this.readScalar();
    if (bytes.byteLength !== 4) {
      this.fail(`expected a 4-byte scalar, found ${bytes.byteLength} bytes`);
    }
    return new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0, true);
  }

  readString(): string {
    const bytes = this.readScalar();
    try {
      return this.utf8.decode(bytes);
    } catch {
      return this.fail('string scalar is not valid UTF-8');
    }
  }

  skipValue(): void {
    const header = this.readU32();
    if ((header & OBJECT_FLAG) === 0) {
      if (this.offset + header > this.data.byteLength) {
        this.fail(`scalar of ${header} bytes runs past the end of data`);
      }
      this.offset += header;
      return;
    }
    const fieldCount = header & ~OBJECT_FLAG;
    for (let i = 0; i < fieldCount; i++) {
      this.skipValue();
    }
  }

  skipFields(count: number): void {
    for (let i = 0; i < count; i++) {
      this.skipValue();
    }
  }
}

function readPresence(reader: ByteTreeReader): SourcePresence {
  const value = reader.readU8Scalar();
  if (value === 1) return 'Present';
  if (value === 0) return 'Missing';
  return reader.fail(`invalid presence value ${value}`);
}

function readTrivia(reader: ByteTreeReader): TriviaPiece[] {
  const pieceCount = reader.readObjectHeader();
  const pieces: TriviaPiece[] = [];

  for (let i = 0; i < pieceCount; i++) {
    const fieldCount = reader.readObjectHeader();
    if (fieldCount < TRIVIA_FIELD_COUNT) {
      reader.fail(`trivia piece needs ${TRIVIA_FIELD_COUNT} fields, found ${fieldCount}`);
    }
    const kind = reader.readString();
    const count = reader.readU32Scalar();
    const text = reader.readString();
    reader.skipFields(fieldCount - TRIVIA_FIELD_COUNT);

    if (isCountedTriviaKind(kind)) {
      pieces.push({ kind, count });
    } else if (isTextualTriviaKind(kind)) {
      pieces.push({ kind, text });
    } else {
      reader.fail(`unknown trivia kind "${kind}"`);
    }
  }
  return pieces;
}

function readNode(reader: ByteTreeReader, fieldCount: number, lookup: OmittedNodeLookup): RawSyntax {
  if (fieldCount < 2) {
    reader.fail(`node needs at least 2 fields, found ${fieldCount}`);
  }
  const tag = reader.readU8Scalar();
  const id = reader.readU32Scalar();

  switch (tag) {
    case NODE_TAG_OMITTED: {
      reader.skipFields(fieldCount - 2);
      const previous = lookup(id);
      if (previous === undefined) {
        return reader.fail(`omitted node ${id} was not part of a previously deserialized tree`);
      }
      return previous;
    }

    case NODE_TAG_TOKEN: {
      if (fieldCount < TOKEN_FIELD_COUNT) {
        reader.fail(`token needs ${TOKEN_FIELD_COUNT} fields, found ${fieldCount}`);
      }
      const presence = readPresence(reader);
      const tokenKind = reader.readString();
      const encodedText = reader.readString();
      const leadingTrivia = readTrivia(reader);
      const trailingTrivia = readTrivia(reader);
      reader.skipFields(fieldCount - TOKEN_FIELD_COUNT);

      // Tokens with a fixed spelling may leave their text empty
      const text = encodedText === '' ? lookupTokenKind(tokenKind)?.text ?? '' : encodedText;
      return { type: 'token', id, presence, tokenKind, text, leadingTrivia, trailingTrivia };
    }

    case NODE_TAG_LAYOUT: {
      if (fieldCount < LAYOUT_FIELD_COUNT) {
        reader.fail(`layout node needs ${LAYOUT_FIELD_COUNT} fields, found ${fieldCount}`);
      }
      const presence = readPresence(reader);
      const kind = reader.readString();
      const childCount = reader.readObjectHeader();
      const layout: Array<RawSyntax | null> = [];
      for (let i = 0; i < childCount; i++) {
        const childFields = reader.readObjectHeader();
        layout.push(childFields === 0 ? null : readNode(reader, childFields, lookup));
      }
      reader.skipFields(fieldCount - LAYOUT_FIELD_COUNT);
      return { type: 'layout', id, presence, kind, layout };
    }

    default:
      return reader.fail(`unknown node tag ${tag}`);
  }
}

export function decodeByteTree(data: Uint8Array, lookup: OmittedNodeLookup): RawSyntax {
  const reader = new ByteTreeReader(data);
  const version = reader.readU32();
  if (version !== BYTE_TREE_PROTOCOL_VERSION) {
    throw new DeserializationError(
      'byte 0',
      `unsupported ByteTree protocol version ${version} (expected ${BYTE_TREE_PROTOCOL_VERSION})`
    );
  }
  const root = readNode(reader, reader.readObjectHeader(), lookup);
  if (reader.remaining > 0) {
    reader.fail('unexpected trailing data after the root node');
  }
  return root;
}
