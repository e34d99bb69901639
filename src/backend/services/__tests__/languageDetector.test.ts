/**
 * Unit tests for the language detector
 */

import { LanguageDetectionAmbiguous } from '../../errors';
import { followUpMarkers, LanguageDetector, tokenize } from '../languageDetector';

describe('LanguageDetector', () => {
    const detector = new LanguageDetector();

    it('should detect Spanish from stop words and inverted question marks', () => {
        const result = detector.detect('¿Cuáles son los requisitos de seguridad?');

        expect(result.language).toBe('es');
        expect(result.scores).toEqual({ en: 0, es: 4, pt: 0 });
        expect(result.confidence).toBe(1);
        expect(result.ambiguous).toBe(false);
    });

    it('should detect English questions', () => {
        const result = detector.detect('What are the safety requirements for operators?');

        expect(result.language).toBe('en');
        expect(result.scores.en).toBe(4);
        expect(result.ambiguous).toBe(false);
    });

    it('should detect Portuguese from stop words and diacritics', () => {
        const result = detector.detect('Quais são os requisitos de segurança?');

        expect(result.language).toBe('pt');
        expect(result.scores).toEqual({ en: 0, es: 0, pt: 5 });
    });

    it('should report text without any marker as ambiguous', () => {
        const result = detector.detect('Pressure vessel');

        expect(result.confidence).toBe(0);
        expect(result.ambiguous).toBe(true);
    });

    it('should report ties as ambiguous', () => {
        expect(detector.detect('el the').ambiguous).toBe(true);
    });

    it('should honour the confidence threshold', () => {
        // en 2 (the, is), es 1 (el): confidence 2/3
        const text = 'the el is';
        expect(new LanguageDetector({ confidenceThreshold: 0.6 }).detect(text).ambiguous).toBe(false);
        expect(new LanguageDetector({ confidenceThreshold: 0.9 }).detect(text).ambiguous).toBe(true);
    });

    describe('classify', () => {
        it('should return the language when confident', () => {
            expect(detector.classify('¿Qué es un recipiente a presión?')).toBe('es');
        });

        it('should throw LanguageDetectionAmbiguous otherwise', () => {
            expect(() => detector.classify('12345')).toThrow(LanguageDetectionAmbiguous);
        });
    });
});

describe('tokenize', () => {
    it('should keep lowercased letter runs only', () => {
        expect(tokenize('¿Qué dice el Artículo 12?')).toEqual(['qué', 'dice', 'el', 'artículo']);
    });
});

describe('followUpMarkers', () => {
    it('should list referential phrases per language', () => {
        expect(followUpMarkers('es')).toContain('ese caso');
        expect(followUpMarkers('en')).toContain('what about');
        expect(followUpMarkers('pt')).toContain('nesse caso');
    });
});
