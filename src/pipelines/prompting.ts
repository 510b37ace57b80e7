import path from "node:path";
import { ConversationMessage, SearchHit } from "../domain/types.js";
import { ChatMessage } from "../infra/ai/types.js";

export const DEFAULT_MAX_FOLLOW_UPS = 3;

const SUPPORT_INSTRUCTIONS = `You are a helpful customer support assistant. Answer user questions using ONLY the information in the source documents below.

## Rules:
1. Only use information from the provided documents. Never use your own knowledge.
2. If the answer is not in the documents, respond with: "I don't know".
3. Write in a friendly, conversational tone.
4. Keep answers clear and concise.

## How to respond:
- For greetings (Hi, Hello, How are you): respond naturally and ask how you can help.
- For questions covered by the documents: answer from the documents.
- For questions NOT covered by the documents: say "I don't know".
- Always be polite and professional.`;

/** A readable label for a hit: the file name plus its page when the format has pages. */
export function describeSource(hit: SearchHit): string {
  const label = hit.metadata.sourceLabel ?? path.basename(hit.metadata.source);
  return hit.metadata.page === null ? label : `${label}, page ${hit.metadata.page}`;
}

export function formatContext(hits: SearchHit[]): string {
  if (hits.length === 0) {
    return "(no matching documents)";
  }

  return hits
    .map(
      (hit, index) =>
        `**Document ${index + 1}**:\n${hit.content}\n(Source: ${describeSource(hit)})`,
    )
    .join("\n\n");
}

export function buildSupportPrompt(question: string, hits: SearchHit[]): string {
  return [
    SUPPORT_INSTRUCTIONS,
    "",
    "## Source Documents:",
    formatContext(hits),
    "",
    "## User Question:",
    question,
    "",
    "## Your Response:",
  ].join("\n");
}

/**
 * Earlier turns go out as plain chat history; only the current question
 * carries the retrieved context.
 */
export function buildAnswerMessages(
  question: string,
  hits: SearchHit[],
  history: ConversationMessage[] = [],
): ChatMessage[] {
  return [
    ...history.map((message) => ({ role: message.role, content: message.content })),
    { role: "user", content: buildSupportPrompt(question, hits) },
  ];
}

export function buildFollowUpMessages(
  question: string,
  answer: string,
  maxQuestions: number,
): ChatMessage[] {
  return [
    {
      role: "system",
      content:
        `Suggest up to ${maxQuestions} short follow-up questions a customer might ask next. ` +
        "Write each question on its own line wrapped in double angle brackets, like <<How do I reset my password?>>. " +
        "Output nothing else.",
    },
    {
      role: "user",
      content: `Question: ${question}\n\nAnswer: ${answer}`,
    },
  ];
}

const FOLLOW_UP_PATTERN = /<<([^<>]*)>>/g;

export function extractFollowUpQuestions(
  content: string,
  maxQuestions = DEFAULT_MAX_FOLLOW_UPS,
): string[] {
  const questions: string[] = [];
  const seen = new Set<string>();

  for (const match of content.matchAll(FOLLOW_UP_PATTERN)) {
    const question = match[1].trim();
    const key = question.toLowerCase();
    if (!question || seen.has(key)) {
      continue;
    }
    seen.add(key);
    questions.push(question);
    if (questions.length >= maxQuestions) {
      break;
    }
  }

  return questions;
}
