/**
 * Answer prompt templates
 *
 * Everything the user can read is localized: the system prompt, the
 * section labels of the rendered prompt and the canned answers returned
 * without an LLM call.
 */

import { LanguageCode } from '../../shared/types';
import { RenderedPrompt } from '../clients/types';

interface PromptLabels {
  context: string;
  noContext: string;
  history: string;
  historyNote: string;
  user: string;
  assistant: string;
  question: string;
  searchQuery: string;
  page: string;
}

const SYSTEM_PROMPTS: Record<LanguageCode, string> = {
  en: `You are an expert assistant on regulations, laws and compliance requirements.
Your job is to help the user understand, interpret and apply regulatory texts.

RULES:
1. Answer ONLY from the CONTEXT section. Do not use general knowledge.
2. If the context does not answer the question, say so plainly.
3. Cite the document and page for each claim, as (Title, p. N).
4. Refer to specific articles or clauses when the context names them.
5. When a provision is ambiguous or depends on circumstances, say so and explain the possible readings.
6. Use a professional, precise tone, like a compliance officer. Use numbered lists when they help.`,
  es: `Eres un asistente experto en regulaciones, leyes y requisitos de cumplimiento.
Tu función es ayudar al usuario a comprender, interpretar y aplicar textos regulatorios.

REGLAS:
1. Responde ÚNICAMENTE a partir de la sección CONTEXTO. No uses conocimiento general.
2. Si el contexto no responde la pregunta, dilo claramente.
3. Cita el documento y la página de cada afirmación, como (Título, p. N).
4. Menciona artículos o cláusulas concretas cuando el contexto los nombre.
5. Cuando una disposición sea ambigua o dependa de las circunstancias, indícalo y explica las posibles interpretaciones.
6. Usa un tono profesional y preciso, como un responsable de cumplimiento. Usa listas numeradas cuando ayuden.`,
  pt: `Você é um assistente especialista em regulamentos, leis e requisitos de conformidade.
Sua função é ajudar o usuário a compreender, interpretar e aplicar textos regulatórios.

REGRAS:
1. Responda SOMENTE com base na seção CONTEXTO. Não use conhecimento geral.
2. Se o contexto não responder à pergunta, diga isso claramente.
3. Cite o documento e a página de cada afirmação, como (Título, p. N).
4. Mencione artigos ou cláusulas específicas quando o contexto os nomear.
5. Quando uma disposição for ambígua ou depender das circunstâncias, indique isso e explique as possíveis interpretações.
6. Use um tom profissional e preciso, como um responsável de conformidade. Use listas numeradas quando ajudarem.`,
};

const LABELS: Record<LanguageCode, PromptLabels> = {
  en: {
    context: 'CONTEXT',
    noContext: 'No context was found for this question.',
    history: 'CONVERSATION HISTORY',
    historyNote: 'For following the conversation only. Previous answers are not sources.',
    user: 'User',
    assistant: 'Assistant',
    question: 'QUESTION',
    searchQuery: 'Search query used',
    page: 'p.',
  },
  es: {
    context: 'CONTEXTO',
    noContext: 'No se encontró contexto para esta pregunta.',
    history: 'HISTORIAL DE LA CONVERSACIÓN',
    historyNote: 'Solo para seguir la conversación. Las respuestas anteriores no son fuentes.',
    user: 'Usuario',
    assistant: 'Asistente',
    question: 'PREGUNTA',
    searchQuery: 'Consulta de búsqueda utilizada',
    page: 'p.',
  },
  pt: {
    context: 'CONTEXTO',
    noContext: 'Nenhum contexto foi encontrado para esta pergunta.',
    history: 'HISTÓRICO DA CONVERSA',
    historyNote: 'Apenas para acompanhar a conversa. Respostas anteriores não são fontes.',
    user: 'Usuário',
    assistant: 'Assistente',
    question: 'PERGUNTA',
    searchQuery: 'Consulta de busca utilizada',
    page: 'p.',
  },
};

export const NO_INFORMATION_MESSAGES: Record<LanguageCode, string> = {
  en: 'I could not find information about this in the available documents. Try rephrasing the question or naming the regulation you are interested in.',
  es: 'No encontré información sobre esto en los documentos disponibles. Intenta reformular la pregunta o indicar la normativa que te interesa.',
  pt: 'Não encontrei informações sobre isso nos documentos disponíveis. Tente reformular a pergunta ou indicar a norma de seu interesse.',
};

export const UNAVAILABLE_MESSAGES: Record<LanguageCode, string> = {
  en: 'The document search is temporarily unavailable. Please try again in a few minutes.',
  es: 'La búsqueda en los documentos no está disponible temporalmente. Vuelve a intentarlo en unos minutos.',
  pt: 'A busca nos documentos está temporariamente indisponível. Tente novamente em alguns minutos.',
};

/**
 * One retrieved passage as shown to the model.
 */
export interface SynthesisContext {
  document: string;
  page: number;
  headingPath: string[];
  text: string;
}

export interface HistoryExchange {
  question: string;
  answer: string;
}

export interface SynthesisRequest {
  systemPrompt: string;
  /** Ordered by rank */
  contexts: SynthesisContext[];
  /** The user's own wording */
  question: string;
  /** Index-language query, set only when it differs from the question */
  searchQuery?: string;
  history: HistoryExchange[];
  answerLanguage: LanguageCode;
  /** Explicit answer-language instruction from routing */
  instruction: string;
}

export function systemPromptFor(language: LanguageCode): string {
  return SYSTEM_PROMPTS[language];
}

/**
 * "Title, p. 3"
 */
export function formatSource(document: string, page: number, language: LanguageCode): string {
  return `${document}, ${LABELS[language].page} ${page}`;
}

/**
 * Renders a SynthesisRequest into one prompt.
 *
 * Layout: context, history, question, then the language instruction last
 * so it is the freshest thing the model reads.
 */
export function renderSynthesisPrompt(request: SynthesisRequest): RenderedPrompt {
  const labels = LABELS[request.answerLanguage];
  const parts: string[] = [];

  parts.push(`--- ${labels.context} ---`);
  if (request.contexts.length === 0) {
    parts.push(labels.noContext);
  }
  request.contexts.forEach((context, index) => {
    const heading = context.headingPath.length > 0 ? ` | ${context.headingPath.join(' > ')}` : '';
    parts.push(
      `\n[${index + 1}] (${formatSource(context.document, context.page, request.answerLanguage)})${heading}`
    );
    parts.push(context.text.trim());
  });
  parts.push(`--- END ${labels.context} ---\n`);

  if (request.history.length > 0) {
    parts.push(`--- ${labels.history} ---`);
    parts.push(labels.historyNote);
    for (const exchange of request.history) {
      parts.push(`${labels.user}: ${exchange.question}`);
      parts.push(`${labels.assistant}: ${exchange.answer}`);
    }
    parts.push(`--- END ${labels.history} ---\n`);
  }

  parts.push(`${labels.question}: ${request.question}`);
  if (request.searchQuery) {
    parts.push(`(${labels.searchQuery}: ${request.searchQuery})`);
  }
  parts.push('');
  parts.push(request.instruction);

  return { system: request.systemPrompt, prompt: parts.join('\n') };
}
