import { DEFAULT_ENGINE_CONFIG, type QueryConfig } from "../config/engine.js";
import { truncateText } from "../text/normalise.js";
import { formatFact, type Evidence } from "./evidence.js";

/** One earlier exchange of the conversation. */
export interface ConversationTurn {
  question: string;
  answer: string;
}

/** Structured payload handed to the answer-synthesis collaborator. */
export interface SynthesisContext {
  question: string;
  history: ConversationTurn[];
  /** Rendered `A --predicate--> B` statements, best path first. */
  facts: string[];
  faqs: Array<{ id: string; question: string; answer: string }>;
  questionOnlyFaqs: Array<{ id: string; question: string }>;
  snippets: Array<{ chunkId: string; documentId: string; text: string }>;
  /** Evidence ids in ranked order. */
  evidenceIds: string[];
}

/** External generative collaborator turning a context into prose. */
export interface AnswerSynthesizer {
  synthesize(context: SynthesisContext): Promise<string>;
}

/**
 * Groups ranked evidence by kind for the synthesiser. Statements are deduplicated
 * and capped at `maxFacts`; snippets are truncated to `maxSnippetChars`; only
 * the last `maxHistoryTurns` turns of history are kept.
 */
export function buildSynthesisContext(
  question: string,
  evidence: readonly Evidence[],
  history: readonly ConversationTurn[] = [],
  config: Pick<QueryConfig, "maxFacts" | "maxHistoryTurns" | "maxSnippetChars"> = DEFAULT_ENGINE_CONFIG.query,
): SynthesisContext {
  const context: SynthesisContext = {
    question,
    history: config.maxHistoryTurns > 0 ? history.slice(-config.maxHistoryTurns).map((turn) => ({ ...turn })) : [],
    facts: [],
    faqs: [],
    questionOnlyFaqs: [],
    snippets: [],
    evidenceIds: evidence.map((item) => item.id),
  };

  const seenFacts = new Set<string>();
  for (const item of evidence) {
    switch (item.kind) {
      case "graph_fact":
        for (const fact of item.facts) {
          const line = formatFact(fact);
          if (context.facts.length < config.maxFacts && !seenFacts.has(line)) {
            seenFacts.add(line);
            context.facts.push(line);
          }
        }
        break;
      case "faq_hit":
        if (item.answer === null) {
          context.questionOnlyFaqs.push({ id: item.faqId, question: item.question });
        } else {
          context.faqs.push({ id: item.faqId, question: item.question, answer: item.answer });
        }
        break;
      case "document_snippet":
        context.snippets.push({
          chunkId: item.chunkId,
          documentId: item.documentId,
          text: truncateText(item.text, config.maxSnippetChars),
        });
        break;
    }
  }
  return context;
}

/** Renders the context as the plain-text prompt sections read by the synthesiser. */
export function renderSynthesisPrompt(context: SynthesisContext): string {
  const sections: string[] = [];

  sections.push(
    "Graph facts:",
    context.facts.length > 0 ? context.facts.map((fact) => `• ${fact}`).join("\n") : "No graph relationships found.",
  );

  if (context.faqs.length > 0) {
    sections.push(
      "",
      "Relevant FAQs:",
      context.faqs.map((faq, index) => `FAQ ${index + 1}: ${faq.question}\nAnswer: ${faq.answer}`).join("\n\n"),
    );
  }
  if (context.questionOnlyFaqs.length > 0) {
    sections.push("", "Users often ask:", context.questionOnlyFaqs.map((faq) => `• ${faq.question}`).join("\n"));
  }
  if (context.snippets.length > 0) {
    sections.push(
      "",
      "Documents:",
      context.snippets
        .map((snippet, index) => `[Document ${index + 1} - ${snippet.documentId}]\n${snippet.text}`)
        .join("\n\n"),
    );
  }

  sections.push(
    "",
    "Previous conversation:",
    context.history.length > 0
      ? context.history.map((turn) => `User: ${turn.question}\nAssistant: ${turn.answer}`).join("\n\n")
      : "None.",
    "",
    "Question:",
    context.question,
  );
  return sections.join("\n");
}
