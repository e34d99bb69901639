/**
 * Prompts used at ingestion time and for translation.
 * Answer prompts live with the AnswerSynthesizer.
 */

import { DocumentSummary, LANGUAGE_NAMES, LanguageCode } from '../../shared/types';

/** Enough of the first page to find a title on it */
const TITLE_INPUT_CHARS = 2000;

export function titlePrompt(firstPage: string): string {
  return [
    'Identify the title of the following document from its first page.',
    'Reply with the title only, without quotes or commentary.',
    '',
    '<page>',
    firstPage.slice(0, TITLE_INPUT_CHARS),
    '</page>',
  ].join('\n');
}

export function mainIdeaPrompt(title: string, text: string): string {
  return [
    `The following text is the beginning of the document "${title}".`,
    'State the main idea of the document in two or three sentences.',
    'Reply with the main idea only.',
    '',
    '<document>',
    text,
    '</document>',
  ].join('\n');
}

export function chunkContextPrompt(
  summary: DocumentSummary,
  chunkText: string,
  language: LanguageCode
): string {
  return [
    `Document title: ${summary.title}`,
    `Main idea of the document: ${summary.mainIdea || '(unknown)'}`,
    '',
    'Here is a passage from this document:',
    '<passage>',
    chunkText,
    '</passage>',
    '',
    'Write a short context (one or two sentences) that situates this passage within the document,',
    'naming the document and the topic the passage deals with, so the passage can be found by search.',
    `Write it in ${LANGUAGE_NAMES[language]}. Reply with the context only.`,
  ].join('\n');
}

export function translationPrompt(text: string, source: LanguageCode, target: LanguageCode): string {
  return [
    `Translate the following text from ${LANGUAGE_NAMES[source]} to ${LANGUAGE_NAMES[target]}.`,
    'Keep legal and technical terms precise. Reply with the translation only.',
    '',
    text,
  ].join('\n');
}
