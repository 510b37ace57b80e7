import { describe, expect, it } from "vitest";
import { SearchHit } from "../src/domain/types.js";
import {
  buildAnswerMessages,
  buildFollowUpMessages,
  describeSource,
  extractFollowUpQuestions,
  formatContext,
} from "../src/pipelines/prompting.js";

function hit(content: string, page: number | null, sourceLabel: string | null = null): SearchHit {
  return {
    id: content,
    score: 0.9,
    content,
    metadata: {
      source: page === null ? "/docs/faq.docx" : "/docs/manual.pdf",
      page,
      fileType: page === null ? "docx" : "pdf",
      chunkId: 0,
      chunkSize: content.length,
      startOffset: 0,
      sourceLabel,
      indexedAt: "2026-01-01T00:00:00.000Z",
    },
  };
}

describe("prompting", () => {
  it("labels sources by file name, label and page", () => {
    expect(describeSource(hit("a", 3))).toBe("manual.pdf, page 3");
    expect(describeSource(hit("b", null))).toBe("faq.docx");
    expect(describeSource(hit("c", 1, "Returns policy 2026"))).toBe("Returns policy 2026, page 1");
  });

  it("numbers context documents with their sources", () => {
    expect(formatContext([hit("Refunds take five days.", 2), hit("Open 9 to 5.", null)])).toBe(
      "**Document 1**:\nRefunds take five days.\n(Source: manual.pdf, page 2)\n\n" +
        "**Document 2**:\nOpen 9 to 5.\n(Source: faq.docx)",
    );
    expect(formatContext([])).toBe("(no matching documents)");
  });

  it("sends history before the grounded question", () => {
    const messages = buildAnswerMessages("How long do refunds take?", [hit("Refunds take five days.", 2)], [
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello! How can I help?" },
    ]);

    expect(messages.map((message) => message.role)).toEqual(["user", "assistant", "user"]);
    const prompt = messages[2].content;
    expect(prompt.startsWith("You are a helpful customer support assistant.")).toBe(true);
    expect(prompt).toContain('If the answer is not in the documents, respond with: "I don\'t know".');
    expect(prompt).toContain(
      "## Source Documents:\n**Document 1**:\nRefunds take five days.\n(Source: manual.pdf, page 2)\n\n## User Question:\nHow long do refunds take?\n\n## Your Response:",
    );
  });

  it("asks for follow-ups in angle brackets", () => {
    const [system, user] = buildFollowUpMessages("Q?", "A.", 2);

    expect(system.role).toBe("system");
    expect(system.content).toContain("Suggest up to 2 short follow-up questions");
    expect(user.content).toBe("Question: Q?\n\nAnswer: A.");
  });

  it("extracts, trims, dedupes and caps follow-up questions", () => {
    const reply = "Sure!\n<< Can I get a refund? >>\n<<can i get a refund?>>\n<<   >>\n<<Where is my parcel?>>\n<<Is there a warranty?>>\n<<Do you ship abroad?>>";

    expect(extractFollowUpQuestions(reply, 3)).toEqual([
      "Can I get a refund?",
      "Where is my parcel?",
      "Is there a warranty?",
    ]);
    expect(extractFollowUpQuestions("No suggestions here.")).toEqual([]);
  });
});
