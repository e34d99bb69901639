/**
 * RAG Engine Tests
 *
 * End to end through the real runtime wiring (segmenter, enhancer, memory
 * index, retriever, router, synthesizer, sessions). Only the language
 * model, translator and embedder are in-process fakes.
 */

import { loadConfig } from '../../config/appConfig';
import { InvalidQueryError, RequestCancelledError } from '../../errors';
import { createRuntime, Runtime } from '../../runtime';
import { NullLogger } from '../../utils/logger';
import {
  FakeLanguageModel,
  FakeTranslator,
  HangingQueryIndex,
  KeywordEmbedder,
  pressureRegulation,
  REGULATION_VOCABULARY,
  TEST_ENV,
} from '../../__tests__/helpers/fakes';
import { VectorIndex } from '../../clients/types';
import { chunkIdFor } from '../documentSegmenter';
import { ANSWER_INSTRUCTIONS } from '../languageRouter';
import { NO_INFORMATION_MESSAGES, UNAVAILABLE_MESSAGES } from '../promptTemplates';

const TRANSLATIONS: Record<string, string> = {
  '¿Cuáles son los requisitos de seguridad?': 'What are the safety requirements?',
  '¿y en ese caso?': 'and in that case?',
};

interface Harness {
  runtime: Runtime;
  llm: FakeLanguageModel;
  translator: FakeTranslator;
  embedder: KeywordEmbedder;
}

async function setup(env: Record<string, string> = {}, index?: VectorIndex): Promise<Harness> {
  const llm = new FakeLanguageModel();
  const translator = new FakeTranslator(TRANSLATIONS);
  const embedder = new KeywordEmbedder(REGULATION_VOCABULARY);
  const runtime = createRuntime(loadConfig({ ...TEST_ENV, ...env }), {
    logger: new NullLogger(),
    languageModel: llm,
    translator,
    embedder,
    index,
  });
  await runtime.ingestion.ingestDocument(pressureRegulation());
  return { runtime, llm, translator, embedder };
}

describe('RAGEngine', () => {
  describe('cross-language answers', () => {
    it('should search in the index language and answer in the user language', async () => {
      const { runtime, llm, translator } = await setup();

      const result = await runtime.engine.ask({ question: '¿Cuáles son los requisitos de seguridad?' });

      expect(result).toMatchObject({
        answer: 'Answer grounded in the context.',
        sources: [{ document: 'Pressure Equipment Regulation', page: 2 }],
        detectedLanguage: 'es',
        searchQuery: 'What are the safety requirements?',
        outcome: 'answered',
      });
      expect(translator.calls).toEqual([
        { text: '¿Cuáles son los requisitos de seguridad?', source: 'es', target: 'en' },
      ]);

      const prompt = llm.prompts[0]?.prompt ?? '';
      expect(prompt).toContain('ARTICLE 3 Safety requirements\nOperators must meet');
      expect(prompt).toContain('PREGUNTA: ¿Cuáles son los requisitos de seguridad?');
      expect(prompt.endsWith(ANSWER_INSTRUCTIONS.es)).toBe(true);
    });

    it('should not translate questions asked in the index language', async () => {
      const { runtime, translator } = await setup();

      const result = await runtime.engine.ask({ question: 'What are the safety requirements?' });

      expect(result.searchQuery).toBe('What are the safety requirements?');
      expect(result.detectedLanguage).toBe('en');
      expect(translator.calls).toEqual([]);
    });

    it('should record the completed turn with its search-origin chunks', async () => {
      const { runtime } = await setup();

      const result = await runtime.engine.ask({ question: '¿Cuáles son los requisitos de seguridad?' });
      const session = await runtime.sessions.get(result.sessionId);

      expect(session?.turns).toHaveLength(1);
      expect(session?.turns[0]).toMatchObject({
        question: '¿Cuáles son los requisitos de seguridad?',
        searchQuery: 'What are the safety requirements?',
        detectedLanguage: 'es',
        retrievedChunkIds: [chunkIdFor('pressure-regulation', 2)],
      });
    });
  });

  describe('outcomes', () => {
    it('should answer without calling the model when nothing relevant is found', async () => {
      const { runtime, llm } = await setup();

      const result = await runtime.engine.ask({ question: 'What does the regulation say about holidays?' });

      expect(result).toMatchObject({
        answer: NO_INFORMATION_MESSAGES.en,
        sources: [],
        outcome: 'no_relevant_information',
      });
      expect(llm.prompts).toHaveLength(0);
      const session = await runtime.sessions.get(result.sessionId);
      expect(session?.turns.map((turn) => turn.retrievedChunkIds)).toEqual([[]]);
    });

    it('should report an unavailable index after the timeout and commit nothing', async () => {
      const index = new HangingQueryIndex();
      const { runtime, llm } = await setup({ VECTOR_INDEX_TIMEOUT_MS: '20' }, index);

      const result = await runtime.engine.ask({ question: 'What are the safety requirements?' });

      expect(result).toEqual({
        sessionId: result.sessionId,
        answer: UNAVAILABLE_MESSAGES.en,
        sources: [],
        detectedLanguage: 'en',
        searchQuery: 'What are the safety requirements?',
        outcome: 'retrieval_unavailable',
      });
      expect(index.queries).toBe(2);
      expect(llm.prompts).toHaveLength(0);
      expect((await runtime.sessions.get(result.sessionId))?.turns).toEqual([]);
    });

    it('should report an unavailable embedding service in the user language', async () => {
      const { runtime, embedder } = await setup();
      embedder.fail = true;

      const result = await runtime.engine.ask({ question: '¿Cuáles son los requisitos de seguridad?' });

      expect(result.outcome).toBe('retrieval_unavailable');
      expect(result.answer).toBe(UNAVAILABLE_MESSAGES.es);
    });

    it('should restrict retrieval to the requested documents', async () => {
      const { runtime } = await setup();

      const result = await runtime.engine.ask(
        { question: 'What are the safety requirements?' },
        { filters: { documentIds: ['another-document'] } }
      );

      expect(result.outcome).toBe('no_relevant_information');
    });
  });

  describe('invalid and cancelled requests', () => {
    it('should reject blank questions before doing any work', async () => {
      const { runtime, embedder } = await setup();
      const embedded = embedder.texts.length;

      await expect(runtime.engine.ask({ question: '  \n ' })).rejects.toBeInstanceOf(InvalidQueryError);
      expect(embedder.texts).toHaveLength(embedded);
    });

    it('should not touch the session when the request is already cancelled', async () => {
      const { runtime } = await setup();
      const controller = new AbortController();
      controller.abort();

      await expect(
        runtime.engine.ask({ question: 'What is the scope?', sessionId: 'cancelled' }, { signal: controller.signal })
      ).rejects.toBeInstanceOf(RequestCancelledError);
      expect(await runtime.sessions.get('cancelled')).toBeNull();
    });

    it('should commit nothing when cancelled while retrieving', async () => {
      const { runtime } = await setup({}, new HangingQueryIndex());
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      await expect(
        runtime.engine.ask({ question: 'What is the scope?', sessionId: 'slow' }, { signal: controller.signal })
      ).rejects.toBeInstanceOf(RequestCancelledError);
      expect((await runtime.sessions.get('slow'))?.turns).toEqual([]);
    });
  });

  describe('multi-turn conversation', () => {
    const questions = [
      'What is the scope of the regulation?',
      'How is a pressure vessel defined?',
      'What are the safety requirements for operators?',
      'How often are inspections carried out?',
      'Who performs the inspections each year?',
      'What penalties does the regulation set?',
      '¿y en ese caso?',
      'Which valves must be certified?',
      'How many months between inspections?',
      'Can the operating license be suspended?',
    ];

    it('should resolve a short follow-up against the previous question', async () => {
      const { runtime, llm } = await setup();
      const pages: number[][] = [];
      let sessionId: string | undefined;

      for (const [turn, question] of questions.entries()) {
        const result = await runtime.engine.ask({ question, sessionId });
        sessionId = result.sessionId;
        pages.push(result.sources.map((source) => source.page));

        if (turn === 6) {
          expect(result).toMatchObject({
            detectedLanguage: 'es',
            searchQuery: 'What penalties does the regulation set? and in that case?',
            outcome: 'answered',
            sources: [{ document: 'Pressure Equipment Regulation', page: 3 }],
          });
          const prompt = llm.prompts.at(-1)?.prompt ?? '';
          expect(prompt).toContain('ARTICLE 5 Penalties');
          expect(prompt).toContain('Usuario: What penalties does the regulation set?');
          expect(prompt.endsWith(ANSWER_INSTRUCTIONS.es)).toBe(true);
        }
        if (turn === 7) {
          // Five words and no referential phrase: a new question.
          expect(result.searchQuery).toBe('Which valves must be certified?');
        }
      }

      expect(pages).toEqual([[1], [1], [2], [2], [2], [3], [3], [2], [2], [3]]);

      const session = await runtime.sessions.get(sessionId ?? '');
      expect(session?.turns).toHaveLength(10);
      expect(session?.turns.map((turn) => turn.detectedLanguage)).toEqual([
        'en', 'en', 'en', 'en', 'en', 'en', 'es', 'en', 'en', 'en',
      ]);
    });

    it('should combine each follow-up with the previous question only', async () => {
      const { runtime } = await setup();
      const searchQueries: string[] = [];
      let sessionId: string | undefined;

      for (const question of [
        'What are the safety requirements?',
        'and the fines?',
        'and the valves?',
        'and the license?',
        'and the months?',
      ]) {
        const result = await runtime.engine.ask({ question, sessionId });
        sessionId = result.sessionId;
        searchQueries.push(result.searchQuery);
      }

      expect(searchQueries).toEqual([
        'What are the safety requirements?',
        'What are the safety requirements? and the fines?',
        'and the fines? and the valves?',
        'and the valves? and the license?',
        'and the license? and the months?',
      ]);
      const session = await runtime.sessions.get(sessionId ?? '');
      expect(session?.turns.map((turn) => turn.routedQuery)).toEqual([
        'What are the safety requirements?',
        'and the fines?',
        'and the valves?',
        'and the license?',
        'and the months?',
      ]);
    });

    it('should find nothing for the same short question without a previous turn', async () => {
      const { runtime } = await setup();

      const result = await runtime.engine.ask({ question: '¿y en ese caso?' });

      expect(result).toMatchObject({
        answer: NO_INFORMATION_MESSAGES.es,
        searchQuery: 'and in that case?',
        outcome: 'no_relevant_information',
      });
    });
  });
});
