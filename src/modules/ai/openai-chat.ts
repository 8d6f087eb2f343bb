// src/modules/ai/openai-chat.ts
import { NetworkError, ProcessingError, toAppError } from "../../errors";
import { ChatCompletionSchema } from "./contracts";

export type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string; detail?: "low" | "high" | "auto" } };

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string | ChatContentPart[];
};

export type ChatJsonRequest = {
  model: string;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  /** Log tag, e.g. "vision.analyze" */
  tag: string;
};

/**
 * Anything that can turn a chat request into the model's parsed JSON answer.
 * The clients depend on this, not on fetch.
 */
export interface ChatJsonTransport {
  completeJson(req: ChatJsonRequest): Promise<unknown>;
}

export type OpenAiChatOptions = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

const DEBUG = () => process.env.DEBUG_AI === "1";

export class OpenAiChatClient implements ChatJsonTransport {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: OpenAiChatOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async completeJson(req: ChatJsonRequest): Promise<unknown> {
    const url = `${this.opts.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.opts.timeoutMs);

    let resp: Response;
    try {
      resp = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.opts.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: req.model,
          messages: req.messages,
          max_tokens: req.maxTokens,
          temperature: req.temperature,
        }),
        signal: controller.signal,
      });

      if (DEBUG()) console.log(`[ai] ${req.tag} -> ${resp.status}`);

      if (!resp.ok) {
        const txt = await resp.text().catch(() => "");
        console.error(`[ai] ${req.tag} failed`, resp.status, txt.slice(0, 250));
        throw httpError(resp.status, txt.slice(0, 250));
      }

      return await parseChatJson(resp, req.tag);
    } catch (e) {
      throw toAppError(e);
    } finally {
      clearTimeout(t);
    }
  }
}

export function httpError(status: number, bodyText?: string): NetworkError {
  if (status === 401 || status === 403) return NetworkError.authFailure(status);
  if (status === 429) return NetworkError.rateLimited(status);
  if (status === 408) return NetworkError.timeout();
  if (status >= 500) return NetworkError.serverError(status, bodyText);
  return NetworkError.badRequest(status, bodyText);
}

async function parseChatJson(resp: Response, tag: string): Promise<unknown> {
  let body: unknown;
  try {
    body = await resp.json();
  } catch (e) {
    throw ProcessingError.serviceFailure(`${tag}: response body is not JSON`, e);
  }

  const envelope = ChatCompletionSchema.safeParse(body);
  if (!envelope.success) {
    throw ProcessingError.serviceFailure(`${tag}: unexpected response envelope`, envelope.error);
  }

  const content = envelope.data.choices[0].message.content;
  if (!content || !content.trim()) {
    throw ProcessingError.serviceFailure(`${tag}: empty response content`);
  }

  return parseJsonContent(content, tag);
}

/** Models sometimes wrap JSON in a ```json fence despite instructions. */
export function parseJsonContent(content: string, tag = "ai"): unknown {
  const trimmed = content.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  const text = fenced ? fenced[1] : trimmed;

  try {
    return JSON.parse(text);
  } catch (e) {
    throw ProcessingError.serviceFailure(`${tag}: response content is not valid JSON`, e);
  }
}
