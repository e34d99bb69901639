/**
 * Query Processor Service
 *
 * Question-level checks that run before any collaborator is called:
 * - validation (reject empty/whitespace-only and oversized questions)
 * - follow-up detection, so "¿y en ese caso?" is searched together with
 *   the question it refers to
 */

import { LanguageCode, SessionTurn } from '../../shared/types';
import { followUpMarkers, tokenize } from './languageDetector';

/**
 * Result of validating a question.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

export const MAX_QUESTION_LENGTH = 4000;

/** Questions this short are read as continuing the previous one */
export const FOLLOW_UP_MAX_WORDS = 4;

/**
 * Validates a user question before processing.
 *
 * Accepts unknown input so request bodies can be passed straight in.
 */
export function validateQuery(query: unknown): ValidationResult {
    if (query === null || query === undefined) {
        return {
            valid: false,
            error: 'Query is required',
        };
    }

    if (typeof query !== 'string') {
        return {
            valid: false,
            error: 'Query must be a string',
        };
    }

    // trim() handles spaces, tabs, newlines, and other whitespace chars
    const trimmedQuery = query.trim();

    if (trimmedQuery.length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    if (trimmedQuery.length > MAX_QUESTION_LENGTH) {
        return {
            valid: false,
            error: `Query cannot be longer than ${MAX_QUESTION_LENGTH} characters`,
        };
    }

    return {
        valid: true,
    };
}

/**
 * A question is a follow-up when there is a previous turn to follow and it
 * is either very short or contains a referential phrase of its language.
 */
export function isFollowUp(
    question: string,
    language: LanguageCode,
    previousTurn: SessionTurn | undefined
): boolean {
    if (!previousTurn) {
        return false;
    }

    const tokens = tokenize(question);
    if (tokens.length === 0) {
        return false;
    }
    if (tokens.length <= FOLLOW_UP_MAX_WORDS) {
        return true;
    }

    // Pad with spaces so markers only match whole words.
    const normalized = ` ${tokens.join(' ')} `;
    return followUpMarkers(language).some((marker) => normalized.includes(` ${marker} `));
}

/**
 * Search text for a follow-up: the previous question, in the index
 * language, followed by the current one.
 */
export function buildFollowUpQuery(previousQuery: string, searchQuery: string): string {
    return `${previousQuery.trim()} ${searchQuery.trim()}`;
}
