import { AppServices, createAppServices } from "../../src/app.js";
import { loadConfig } from "../../src/config/env.js";
import { InputError } from "../../src/domain/errors.js";
import { LoadedDocument } from "../../src/domain/types.js";
import { InMemoryVectorStore } from "../../src/infra/store/inMemoryVectorStore.js";
import { DocumentLoader } from "../../src/services/ingestionService.js";
import { FakeAiClient } from "./fakeAiClient.js";

export const COLLECTION = "support_docs";

export function repeatToLength(phrase: string, length: number): string {
  return phrase.repeat(Math.ceil(length / phrase.length)).slice(0, length);
}

export const REFUND_PAGE = repeatToLength("refund policy thirty days receipt required ", 900);

/** A three page manual: 1500, 900 and 2600 characters. */
export function manualDocument(filePath: string): LoadedDocument {
  return {
    path: filePath,
    fileType: "pdf",
    sections: [
      { page: 1, text: repeatToLength("shipping carriers tracking numbers parcels ", 1500) },
      { page: 2, text: REFUND_PAGE },
      { page: 3, text: repeatToLength("warranty repair battery screen replacement ", 2600) },
    ],
  };
}

/** Serves documents from a map; unknown paths fail like an unreadable file. */
export function fakeLoader(documents: Record<string, LoadedDocument>): DocumentLoader {
  return async (filePath) => {
    const document = documents[filePath];
    if (!document) {
      throw new InputError("FILE_UNREADABLE", `Cannot read ${filePath}`);
    }
    return document;
  };
}

export interface TestApp {
  services: AppServices;
  ai: FakeAiClient;
  store: InMemoryVectorStore;
}

export async function createTestApp(
  options: { env?: Record<string, string>; documents?: Record<string, LoadedDocument> } = {},
): Promise<TestApp> {
  const ai = new FakeAiClient(32);
  const store = new InMemoryVectorStore();
  const config = loadConfig({
    COLLECTION_NAME: COLLECTION,
    VECTOR_STORE: "memory",
    VECTOR_DIMENSION: "32",
    EMBEDDING_PROVIDER: "ollama",
    CHAT_PROVIDER: "ollama",
    ...options.env,
  });
  const services = await createAppServices(config, {
    store,
    aiClient: ai,
    loadDocument: fakeLoader(options.documents ?? {}),
  });
  return { services, ai, store };
}
