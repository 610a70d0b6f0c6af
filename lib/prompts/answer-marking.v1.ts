// ============================================================
// Prompt: Answer Marking v1
// Marks a free-text answer into the three score tiers.
// Output keys are the ones JudgmentParser reads.
// ============================================================

import type { LLMMessage, Locale } from "@/lib/llm/types";

export const PROMPT_VERSION = "answer-marking.v1";

interface MarkingContext {
    subject: string;
    question: string;
    studentAnswer: string;
}

export function buildPrompt(
    locale: Locale,
    ctx: MarkingContext
): LLMMessage[] {
    const lang = locale === "ru" ? "Russian" : "English";

    return [
        {
            role: "system",
            content: [
                `You are a fair and encouraging examiner.`,
                `Mark the student's answer and explain in ${lang}.`,
                ``,
                `Respond ONLY with valid JSON:`,
                `{`,
                `  "score": "Full Marks" | "Partial Marks" | "Incorrect",`,
                `  "is_correct": <boolean>,`,
                `  "correct_answer": "<a complete model answer>",`,
                `  "explanation": "<what was right or missing>"`,
                `}`,
                `is_correct is true only for Full Marks.`,
                `Do NOT include markdown code fences or any text outside the JSON.`,
            ].join("\n"),
        },
        {
            role: "user",
            content: [
                `Subject: ${ctx.subject}`,
                `Question: ${ctx.question}`,
                ``,
                `Student's answer:`,
                ctx.studentAnswer.trim() || "(no answer)",
            ].join("\n"),
        },
    ];
}
