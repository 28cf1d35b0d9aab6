import type { TemplateKey } from "../catalog/index.js";
import type { DiagnosticArgValue } from "./arg-value.js";

/** Argument values captured when a part was merged, keyed by placeholder. */
export type BoundArgs = Readonly<Record<string, DiagnosticArgValue>>;

/** Text for a diagnostic or one of its parts: a template to look up, or fixed text. */
export type DiagnosticMessage =
  | {
      readonly kind: "template";
      readonly key: TemplateKey;
      readonly attr?: string;
      /** When present, the template renders from these instead of the diagnostic's shared args. */
      readonly args?: BoundArgs;
    }
  | { readonly kind: "static"; readonly text: string };

/** What message-taking methods accept; a bare key means that template. */
export type MessageInput = TemplateKey | DiagnosticMessage;

export function templateMessage(key: TemplateKey, attr?: string): DiagnosticMessage {
  return attr === undefined ? { kind: "template", key } : { kind: "template", key, attr };
}

export function boundMessage(key: TemplateKey, args: BoundArgs): DiagnosticMessage {
  return { kind: "template", key, args: { ...args } };
}

export function staticMessage(text: string): DiagnosticMessage {
  return { kind: "static", text };
}

export function toMessage(input: MessageInput): DiagnosticMessage {
  return typeof input === "string" ? templateMessage(input) : input;
}

export function formatMessage(message: DiagnosticMessage): string {
  if (message.kind === "static") return message.text;
  return message.attr === undefined ? message.key : `${message.key}.${message.attr}`;
}
