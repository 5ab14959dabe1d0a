import { describe, it, expect } from 'vitest';
import { hasIdentifyingField, parseCandidate, parseIngestRecord, stripDoiPrefix } from '../matching/candidate.js';

describe('stripDoiPrefix', () => {
    it('should strip resolver URLs and the doi: scheme', () => {
        expect(stripDoiPrefix('https://doi.org/10.1234/Test')).toBe('10.1234/Test');
        expect(stripDoiPrefix('http://dx.doi.org/10.5/ABC')).toBe('10.5/ABC');
        expect(stripDoiPrefix('doi: 10.1234/x')).toBe('10.1234/x');
        expect(stripDoiPrefix('10.1234/x')).toBe('10.1234/x');
    });
});

describe('parseCandidate', () => {
    it('should trim text, coerce years and strip DOI prefixes', () => {
        const result = parseCandidate({ doi: 'https://doi.org/10.1234/Test', title: '  Old Babylonian Letters  ', year: '1995' });
        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.value.doi).toBe('10.1234/Test');
        expect(result.value.title).toBe('Old Babylonian Letters');
        expect(result.value.year).toBe(1995);
    });

    it('should turn null fields into absent ones', () => {
        const result = parseCandidate({ doi: null, bibtex_key: null, title: 'X' });
        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.value.doi).toBeUndefined();
        expect(result.value.bibtex_key).toBeUndefined();
    });

    it('should store numeric volumes as strings', () => {
        const result = parseCandidate({ short_title: 'RIME', volume: 4 });
        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.value.volume).toBe('4');
    });

    it('should drop unknown keys', () => {
        const result = parseCandidate({ title: 'X', publisher: 'Somewhere' });
        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(Object.keys(result.value)).not.toContain('publisher');
    });

    it('should reject an empty title', () => {
        expect(parseCandidate({ title: '   ' })).toEqual({
            success: false,
            error: 'title: must not be empty (omit the field or use null)',
        });
    });

    it('should reject a DOI prefix without identifier', () => {
        expect(parseCandidate({ doi: 'doi:' })).toEqual({ success: false, error: 'doi: DOI prefix without identifier' });
    });

    it('should reject a non-numeric year', () => {
        expect(parseCandidate({ title: 'X', year: 'MCMXCV' }).success).toBe(false);
    });

    it('should reject a record that is not an object', () => {
        expect(parseCandidate('10.1234/x').success).toBe(false);
    });

    it('should accept a record without any field', () => {
        expect(parseCandidate({}).success).toBe(true);
    });
});

describe('parseIngestRecord', () => {
    it('should carry the source tag', () => {
        const result = parseIngestRecord({ title: 'X', source: 'oracc' });
        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.value.source).toBe('oracc');
    });
});

describe('hasIdentifyingField', () => {
    it('should require a usable field combination', () => {
        expect(hasIdentifyingField({})).toBe(false);
        expect(hasIdentifyingField({ title: 'X' })).toBe(false);
        expect(hasIdentifyingField({ title: 'X', year: 1990 })).toBe(true);
        expect(hasIdentifyingField({ short_title: 'RIME' })).toBe(false);
        expect(hasIdentifyingField({ short_title: 'RIME', volume: '4' })).toBe(true);
        expect(hasIdentifyingField({ doi: '10.1/x' })).toBe(true);
        expect(hasIdentifyingField({ bibtex_key: 'frayne1990' })).toBe(true);
    });
});
