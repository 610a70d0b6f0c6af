// ============================================================
// LLM message types shared by the prompt builders
// ============================================================

export type Locale = "en" | "ru";

export interface LLMMessage {
    role: "system" | "user" | "assistant";
    content: string;
}
