/**
 * Tests for json.ts
 */

import { ValidationError } from '../src/errors';
import { extractJson, parseJsonPayload, stripCodeFences } from '../src/providers/ai/json';

function reasonOf(fn: () => unknown): string | null {
    try {
        fn();
        return null;
    } catch (error) {
        return error instanceof ValidationError ? error.reason : 'other';
    }
}

describe('stripCodeFences', () => {
    it('should remove a json fence', () => {
        expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('should remove a bare fence', () => {
        expect(stripCodeFences('```\n[1]\n```')).toBe('[1]');
    });
});

describe('extractJson', () => {
    it('should cut the payload out of surrounding prose', () => {
        expect(extractJson('Here you go: {"a": [1, 2]} Hope that helps!')).toBe('{"a": [1, 2]}');
    });

    it('should ignore brackets inside strings', () => {
        expect(extractJson('{"title": "Use } and { carefully", "n": 1} trailing'))
            .toBe('{"title": "Use } and { carefully", "n": 1}');
    });
});

describe('parseJsonPayload', () => {
    it('should parse an object', () => {
        expect(parseJsonPayload('```json\n{"title": "Hello"}\n```', 'object')).toEqual({ title: 'Hello' });
    });

    it('should parse an array', () => {
        expect(parseJsonPayload('[{"title": "A"}]', 'array')).toEqual([{ title: 'A' }]);
    });

    it('should report a response cut off mid-object as truncated', () => {
        expect(reasonOf(() => parseJsonPayload('{"title": "Hello", "content": "Once upon', 'object'))).toBe('truncated');
    });

    it('should report other parse failures as malformed', () => {
        expect(reasonOf(() => parseJsonPayload("{title: 'Hello'}", 'object'))).toBe('malformed');
    });

    it('should reject the wrong shape', () => {
        expect(reasonOf(() => parseJsonPayload('{"title": "A"}', 'array'))).toBe('schema');
        expect(reasonOf(() => parseJsonPayload('[1, 2]', 'object'))).toBe('schema');
    });
});
