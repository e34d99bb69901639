/**
 * Language Detector
 *
 * Scores a text against the supported languages using stop words and
 * orthographic markers (¿ ¡ ñ for Spanish, ã õ ç for Portuguese).
 * Questions are short, so this is a heuristic: anything unclear is
 * reported as ambiguous and the caller falls back to the index language.
 */

import { LanguageCode, SUPPORTED_LANGUAGES } from '../../shared/types';
import languageMarkers from '../data/languageMarkers.json';
import { LanguageDetectionAmbiguous } from '../errors';

type MarkerTable = Record<LanguageCode, string[]>;

const STOP_WORDS: Record<LanguageCode, ReadonlySet<string>> = toSets(languageMarkers.stopWords);
const ORTHOGRAPHIC_MARKERS: MarkerTable = languageMarkers.orthographicMarkers;
const FOLLOW_UP_MARKERS: MarkerTable = languageMarkers.followUpMarkers;

export interface LanguageDetectorConfig {
    /** Minimum share of the total score the winner needs */
    confidenceThreshold: number;
}

export const DEFAULT_DETECTOR_CONFIG: LanguageDetectorConfig = {
    confidenceThreshold: 0.6,
};

export interface DetectionResult {
    /** Best-scoring language (first supported language when nothing matched) */
    language: LanguageCode;
    /** Winner's share of the total score, 0 when nothing matched */
    confidence: number;
    scores: Record<LanguageCode, number>;
    ambiguous: boolean;
}

/**
 * Lowercased letter runs. Punctuation and digits are dropped.
 */
export function tokenize(text: string): string[] {
    return text.toLowerCase().match(/\p{L}+/gu) ?? [];
}

/**
 * Referential phrases of a language ("ese caso", "the above", ...).
 */
export function followUpMarkers(language: LanguageCode): readonly string[] {
    return FOLLOW_UP_MARKERS[language];
}

export class LanguageDetector {
    private readonly config: LanguageDetectorConfig;

    constructor(config: Partial<LanguageDetectorConfig> = {}) {
        this.config = { ...DEFAULT_DETECTOR_CONFIG, ...config };
    }

    detect(text: string): DetectionResult {
        const tokens = tokenize(text);
        const lowered = text.toLowerCase();

        const scores = { en: 0, es: 0, pt: 0 } satisfies Record<LanguageCode, number>;
        for (const language of SUPPORTED_LANGUAGES) {
            const stopWords = STOP_WORDS[language];
            let score = tokens.filter((token) => stopWords.has(token)).length;
            for (const marker of ORTHOGRAPHIC_MARKERS[language]) {
                score += lowered.split(marker).length - 1;
            }
            scores[language] = score;
        }

        const ranked = [...SUPPORTED_LANGUAGES].sort((a, b) => scores[b] - scores[a]);
        const first = ranked[0] ?? 'en';
        const second = ranked[1];
        const top = scores[first];
        const total = scores.en + scores.es + scores.pt;
        const confidence = total === 0 ? 0 : top / total;

        return {
            language: first,
            confidence,
            scores,
            ambiguous:
                total === 0 ||
                (second !== undefined && scores[second] === top) ||
                confidence < this.config.confidenceThreshold,
        };
    }

    /**
     * @throws LanguageDetectionAmbiguous when the result is not confident
     */
    classify(text: string): LanguageCode {
        const result = this.detect(text);
        if (result.ambiguous) {
            throw new LanguageDetectionAmbiguous(
                `Could not tell the language apart (confidence ${result.confidence.toFixed(2)})`
            );
        }
        return result.language;
    }
}

function toSets(table: MarkerTable): Record<LanguageCode, ReadonlySet<string>> {
    return {
        en: new Set(table.en),
        es: new Set(table.es),
        pt: new Set(table.pt),
    };
}
