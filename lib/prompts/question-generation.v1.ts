// ============================================================
// Prompt: Question Generation v1
// Generates a run's questions from a revision's study material.
// The multiple-choice format is the one QuestionParser reads.
// ============================================================

import type { LLMMessage, Locale } from "@/lib/llm/types";
import type { QuestionStyle } from "@/lib/schemas/quiz";

export const PROMPT_VERSION = "question-generation.v1";

// Keeps the request bounded when many files were uploaded.
const MAX_MATERIAL_CHARS = 12_000;

interface QuestionGenContext {
    subject: string;
    topics: string[];
    description: string | null;
    questionCount: number;
    questionStyle: QuestionStyle;
    /** filename → extracted text */
    extractedTexts: Record<string, string>;
}

function formatRules(style: QuestionStyle, count: number): string[] {
    if (style === "multiple-choice") {
        return [
            `Write exactly ${count} multiple-choice questions in this plain-text format:`,
            ``,
            `QUESTION: <question text>`,
            `A) <option>`,
            `B) <option>`,
            `C) <option>`,
            `D) <option>`,
            `CORRECT: <letter>`,
            `RATIONALE: <one or two sentences on why it is correct>`,
            ``,
            `Rules:`,
            `- Leave one blank line between questions.`,
            `- Exactly four options, lettered A to D.`,
            `- CORRECT is a single letter.`,
            `- Do NOT use JSON or markdown.`,
        ];
    }
    return [
        `Write exactly ${count} open questions, one per line.`,
        ``,
        `Rules:`,
        `- No numbering, bullets or answers.`,
        `- Each question must be answerable in a few sentences.`,
    ];
}

export function materialSection(extractedTexts: Record<string, string>): string[] {
    const entries = Object.entries(extractedTexts).filter(([, text]) => text.trim().length > 0);
    if (entries.length === 0) {
        return [];
    }
    const lines = [``, `Study material:`];
    let budget = MAX_MATERIAL_CHARS;
    for (const [filename, text] of entries) {
        if (budget <= 0) break;
        const excerpt = text.trim().slice(0, budget);
        budget -= excerpt.length;
        lines.push(`--- ${filename} ---`, excerpt);
    }
    return lines;
}

export function buildPrompt(
    locale: Locale,
    ctx: QuestionGenContext
): LLMMessage[] {
    const lang = locale === "ru" ? "Russian" : "English";

    return [
        {
            role: "system",
            content: [
                `You are an expert examiner writing revision questions.`,
                `Write the questions in ${lang}.`,
                ``,
                ...formatRules(ctx.questionStyle, ctx.questionCount),
            ].join("\n"),
        },
        {
            role: "user",
            content: [
                `Subject: ${ctx.subject}`,
                `Topics: ${ctx.topics.length > 0 ? ctx.topics.join(", ") : "any"}`,
                ...(ctx.description ? [`Notes: ${ctx.description}`] : []),
                ...materialSection(ctx.extractedTexts),
            ].join("\n"),
        },
    ];
}
