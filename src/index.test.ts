import { describe, it, expect } from 'vitest';
import {
  parse,
  parseAll,
  stringify,
  validate,
  fromJSON,
  toJSON,
  Value,
  ParseError,
  LexError,
  NotFoundError,
  TypeMismatchError,
} from './index';

describe('lexitree API', () => {
  describe('parse', () => {
    it('should parse null', () => {
      expect(parse('null').isNull()).toBe(true);
    });

    it('should parse booleans', () => {
      expect(parse('true').getBool()).toBe(true);
      expect(parse('false').getBool()).toBe(false);
    });

    it('should parse numbers', () => {
      expect(parse('42').getNumber()).toBe(42);
      expect(parse('3.14').getNumber()).toBe(3.14);
      expect(parse('-7').getNumber()).toBe(-7);
    });

    it('should parse quoted strings', () => {
      expect(parse('"hello world"').getString()).toBe('hello world');
    });

    it('should return the last top-level value', () => {
      expect(parse('1 2 3').getNumber()).toBe(3);
      expect(parseAll('1 2 3').length).toBe(3);
    });

    it('should give null for an empty document', () => {
      expect(parse('').isNull()).toBe(true);
    });

    it('should look up parsed members', () => {
      const doc = parse('{"name": "box", "count": 2}');

      expect(doc.find('name').getString()).toBe('box');
      expect(doc.get('count').getNumber()).toBe(2);
      expect(() => doc.find('missing')).toThrow(NotFoundError);
      expect(doc.get('missing').isNull()).toBe(true);
      expect(doc.size).toBe(3);
    });

    it('should not coerce a number to a string', () => {
      expect(() => parse('{"n": 1}').find('n').getString()).toThrow(TypeMismatchError);
    });

    it('should pass options through', () => {
      const doc = parse('{"a":1,"b":2}', { memberOrder: 'append' });

      expect(stringify(doc)).toBe('{"a":1,"b":2}');
      expect(() => parse('nope', { strictNull: true })).toThrow(LexError);
    });

    it.each(['{"a" 1}', '[1,,2]', '[1 2]'])('should raise ParseError for %s', source => {
      expect(() => parse(source)).toThrow(ParseError);
    });
  });

  describe('stringify', () => {
    it('should render JSON by default', () => {
      expect(stringify(parse('[1, {"a": "x"}]'))).toBe('[1,{"a":"x"}]');
    });

    it('should render the legacy layout', () => {
      expect(stringify(parse('{"a":[true,null]}'), { format: 'legacy' })).toBe(
        '{ a:[ true, null, ] , } '
      );
    });

    it('should render values built by hand', () => {
      const doc = Value.object();
      doc.get('list').setList();
      doc.get('list').pushBack(Value.number(1));
      doc.get('flag').setBool(true);

      expect(stringify(doc)).toBe('{"list":[1],"flag":true}');
    });
  });

  describe('validate', () => {
    it('should accept well-formed input', () => {
      expect(validate('{"a": [1, 2]}')).toEqual({ valid: true });
    });

    it('should report the error for malformed input', () => {
      const result = validate('[1 2]');

      expect(result.valid).toBe(false);
      expect(result.error).toBeInstanceOf(ParseError);
      expect(result.error?.kind).toBe('ParseError');
    });

    it('should report lexical errors', () => {
      const result = validate('[1, ?]');

      expect(result.valid).toBe(false);
      expect(result.error).toBeInstanceOf(LexError);
    });
  });

  describe('JSON conversion', () => {
    it('should convert JSON text through a value tree', () => {
      expect(fromJSON('{"b": 1, "a": [true]}')).toBe('{"b":1,"a":[true]}');
      expect(fromJSON('{"b": 1}', { format: 'legacy' })).toBe('{ b:1, } ');
    });

    it('should convert a document to indented JSON', () => {
      expect(toJSON('{"a":1,"b":2}')).toBe('{\n  "b": 2,\n  "a": 1\n}');
    });
  });
});
