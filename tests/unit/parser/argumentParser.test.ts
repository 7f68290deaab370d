/**
 * Tests for the argument store
 */

import { describe, it, expect } from 'vitest';
import { ArgumentStore, Flags } from '../../../src/cli/parser/argumentParser.js';
import {
  MalformedArgumentError,
  MissingRequiredArgumentError,
  UnkeyedArgumentError,
} from '../../../src/cli/errors.js';

describe('ArgumentStore', () => {
  describe('parse', () => {
    it('should pair value flags with the token that follows them', () => {
      const store = ArgumentStore.parse(['-deserialize', '-pre-edit-tree', 'a.json', '-out', 'b.swift']);

      expect(store.get(Flags.preEditTree)).toBe('a.json');
      expect(store.get(Flags.out)).toBe('b.swift');
    });

    it('should record a flag followed by another flag as a boolean switch', () => {
      const store = ArgumentStore.parse(['-deserialize', '-help']);

      expect(store.has(Flags.deserialize)).toBe(true);
      expect(store.get(Flags.deserialize)).toBeUndefined();
      expect(store.has(Flags.help)).toBe(true);
    });

    it('should keep the last value when a flag is repeated', () => {
      const store = ArgumentStore.parse(['-out', 'first.swift', '-out', 'second.swift']);

      expect(store.get(Flags.out)).toBe('second.swift');
      expect(store.flagNames).toEqual(['-out']);
    });

    it('should accept an empty token as a value', () => {
      const store = ArgumentStore.parse(['-serialization-format', '']);

      expect(store.has(Flags.serializationFormat)).toBe(true);
      expect(store.get(Flags.serializationFormat)).toBe('');
    });

    it('should store unknown flags without interpreting them', () => {
      const store = ArgumentStore.parse(['-verbose', '-level', '3']);

      expect(store.has('-verbose')).toBe(true);
      expect(store.get('-level')).toBe('3');
    });

    it('should fail when a value flag is the last token', () => {
      expect(() => ArgumentStore.parse(['-deserialize', '-out'])).toThrow(MalformedArgumentError);
      expect(() => ArgumentStore.parse(['-deserialize', '-out'])).toThrow('Missing value for argument -out');
    });

    it('should fail when a value flag is followed by another flag', () => {
      expect(() => ArgumentStore.parse(['-pre-edit-tree', '-deserialize'])).toThrow(
        new MalformedArgumentError('-pre-edit-tree')
      );
    });

    it('should fail on a value that has no flag in front of it', () => {
      expect(() => ArgumentStore.parse(['stray.json', '-deserialize'])).toThrow(UnkeyedArgumentError);
      expect(() => ArgumentStore.parse(['stray.json'])).toThrow(
        'Unexpected argument "stray.json" without a preceding flag'
      );
    });

    it('should fail on a second value after a flag', () => {
      expect(() => ArgumentStore.parse(['-out', 'a.swift', 'b.swift'])).toThrow(UnkeyedArgumentError);
    });

    it('should parse an empty argument vector', () => {
      const store = ArgumentStore.parse([]);
      expect(store.flagNames).toEqual([]);
    });
  });

  describe('getRequired', () => {
    it('should return the value of a present flag', () => {
      const store = ArgumentStore.parse(['-source-file', 'main.swift']);
      expect(store.getRequired(Flags.sourceFile)).toBe('main.swift');
    });

    it('should name the flag when it is missing', () => {
      const store = ArgumentStore.parse(['-deserialize']);

      expect(() => store.getRequired(Flags.preEditTree)).toThrow(MissingRequiredArgumentError);
      expect(() => store.getRequired(Flags.preEditTree)).toThrow('Missing required argument: -pre-edit-tree');
    });

    it('should treat a boolean switch as having no value', () => {
      const store = ArgumentStore.parse(['-unknown-switch']);
      expect(() => store.getRequired('-unknown-switch')).toThrow(MissingRequiredArgumentError);
    });
  });
});
