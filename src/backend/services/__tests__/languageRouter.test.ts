/**
 * Unit tests for the language router state machine
 */

import { RequestCancelledError } from '../../errors';
import { NullLogger } from '../../utils/logger';
import { RetryPolicy } from '../../utils/retryPolicy';
import { FakeTranslator } from '../../__tests__/helpers/fakes';
import { LanguageDetector } from '../languageDetector';
import { ANSWER_INSTRUCTIONS, LanguageRouter, RouterStateError } from '../languageRouter';

const SPANISH_QUESTION = '¿Cuáles son los requisitos de seguridad?';

function buildRouter(translator: FakeTranslator, indexLanguage: 'en' | 'es' = 'en'): LanguageRouter {
    return new LanguageRouter(
        new LanguageDetector(),
        translator,
        new RetryPolicy({ maxAttempts: 2, baseDelayMs: 1, timeoutMs: 0 }),
        { indexLanguage },
        new NullLogger()
    );
}

describe('LanguageRouter', () => {
    it('should not call the translator when the question is in the index language', async () => {
        const translator = new FakeTranslator();
        const route = buildRouter(translator).begin();

        expect(route.detect('What are the safety requirements?')).toEqual({ userLanguage: 'en', ambiguous: false });
        const routed = await route.routeIn();

        expect(routed).toEqual({
            userLanguage: 'en',
            searchQuery: 'What are the safety requirements?',
            translated: false,
        });
        expect(translator.calls).toHaveLength(0);
    });

    it('should translate the question into the index language', async () => {
        const translator = new FakeTranslator({ [SPANISH_QUESTION]: 'What are the safety requirements?' });
        const route = buildRouter(translator).begin();

        route.detect(SPANISH_QUESTION);
        const routed = await route.routeIn();

        expect(routed).toEqual({
            userLanguage: 'es',
            searchQuery: 'What are the safety requirements?',
            translated: true,
        });
        expect(translator.calls).toEqual([{ text: SPANISH_QUESTION, source: 'es', target: 'en' }]);
    });

    it('should search the untranslated question when translation keeps failing', async () => {
        const translator = new FakeTranslator();
        translator.fail = true;
        const route = buildRouter(translator).begin();

        route.detect(SPANISH_QUESTION);
        const routed = await route.routeIn();

        expect(routed).toEqual({ userLanguage: 'es', searchQuery: SPANISH_QUESTION, translated: false });
        expect(translator.calls).toHaveLength(2);
        expect(route.state).toBe('RETRIEVE');
    });

    it('should treat a blank translation as a failure', async () => {
        const translator = new FakeTranslator({ [SPANISH_QUESTION]: '   ' });
        const route = buildRouter(translator).begin();

        route.detect(SPANISH_QUESTION);
        const routed = await route.routeIn();

        expect(routed.translated).toBe(false);
        expect(routed.searchQuery).toBe(SPANISH_QUESTION);
    });

    it('should propagate cancellation instead of falling back', async () => {
        const controller = new AbortController();
        controller.abort();
        const translator = new FakeTranslator();
        const route = buildRouter(translator).begin();

        route.detect(SPANISH_QUESTION);

        await expect(route.routeIn(controller.signal)).rejects.toBeInstanceOf(RequestCancelledError);
        expect(translator.calls).toHaveLength(0);
    });

    it('should assume the index language when detection is ambiguous', () => {
        const translator = new FakeTranslator();

        expect(buildRouter(translator).begin().detect('ISO 4126')).toEqual({ userLanguage: 'en', ambiguous: true });
        expect(buildRouter(translator, 'es').begin().detect('ISO 4126')).toEqual({
            userLanguage: 'es',
            ambiguous: true,
        });
    });

    it('should answer in the user language', async () => {
        const translator = new FakeTranslator();
        const route = buildRouter(translator).begin();

        route.detect(SPANISH_QUESTION);
        await route.routeIn();

        expect(route.routeOut()).toEqual({ answerLanguage: 'es', instruction: ANSWER_INSTRUCTIONS.es });
        route.complete();
        expect(route.state).toBe('DONE');
    });

    describe('state transitions', () => {
        it('should reject steps taken out of order', async () => {
            const route = buildRouter(new FakeTranslator()).begin();

            expect(() => route.routeOut()).toThrow(RouterStateError);
            await expect(route.routeIn()).rejects.toBeInstanceOf(RouterStateError);

            route.detect('What is the scope?');
            expect(() => route.detect('What is the scope?')).toThrow(
                'Language route expected state DETECT but is in ROUTE_IN'
            );
        });

        it('should start every request from DETECT', () => {
            const router = buildRouter(new FakeTranslator());
            const first = router.begin();
            first.detect('What is the scope?');

            expect(router.begin().state).toBe('DETECT');
        });
    });
});
