import type { HistoryTurn } from "../modules/capabilities/types.js";
import type { Chunk } from "../modules/rag/types.js";
import { formatArticleLabel } from "../modules/text/text-normalizer.js";

export const LEGAL_ANSWER_SYSTEM_PROMPT = [
  "أنت مساعد قانوني متخصص في قوانين الدول العربية.",
  "أجب عن سؤال المستخدم اعتماداً فقط على النصوص القانونية المرقمة المقدمة لك.",
  "اذكر رقم المادة واسم القانون لكل معلومة، واستخدم رقم النص بين قوسين معقوفين مثل [1].",
  "إذا لم تكفِ النصوص المقدمة للإجابة فقل ذلك صراحة ولا تخترع أحكاماً.",
  "أجب باللغة العربية الفصحى وبأسلوب واضح ومنظم."
].join("\n");

export const INSUFFICIENT_CONTEXT_ANSWER = "لم أجد معلومات كافية للإجابة على سؤالك.";
export const GENERATION_FAILED_ANSWER = "عذراً، تعذر إنشاء الإجابة في الوقت الحالي. يرجى المحاولة مرة أخرى.";

export const formatContextChunk = (chunk: Chunk, index: number): string =>
  `[${index + 1}] ${chunk.lawName} - ${formatArticleLabel(chunk.articleNumber)}:\n${chunk.displayText}`;

export const formatContextChunks = (chunks: Chunk[]): string =>
  chunks.map((chunk, index) => formatContextChunk(chunk, index)).join("\n\n---\n\n");

export const formatHistory = (history: HistoryTurn[]): string =>
  history.map((turn) => `المستخدم: ${turn.question}\nالمساعد: ${turn.answer}`).join("\n\n");

export const buildAnswerUserPrompt = (input: {
  question: string;
  contextChunks: Chunk[];
  history: HistoryTurn[];
}): string => {
  const sections: string[] = [];
  if (input.history.length > 0) {
    sections.push("المحادثة السابقة:", formatHistory(input.history), "");
  }
  sections.push(
    "النصوص القانونية:",
    input.contextChunks.length > 0 ? formatContextChunks(input.contextChunks) : "(لا توجد نصوص)",
    "",
    `السؤال: ${input.question}`
  );
  return sections.join("\n");
};

export const RERANKER_SYSTEM_PROMPT = [
  "You are a relevance scorer for Arabic statutory text.",
  "Score how well each candidate passage answers the user's legal question.",
  "Return only valid JSON with a `scores` array of objects holding the candidate `id` and a `score` between 0 and 1.",
  "Use only candidate IDs that were provided.",
  "Do not include any explanation or extra keys."
].join(" ");

export type RerankerPromptCandidate = {
  tempId: string;
  text: string;
};

export const buildRerankerUserPrompt = (input: { query: string; candidates: RerankerPromptCandidate[] }): string => {
  const candidateLines = input.candidates.map(({ tempId, text }, index) =>
    [`Candidate ${index + 1} (${tempId})`, "text:", text].join("\n")
  );

  return [
    "User question:",
    input.query,
    "",
    "Return JSON exactly like:",
    '{"scores":[{"id":"cand_1","score":0.92},{"id":"cand_2","score":0.15}]}',
    "",
    "Candidates:",
    ...candidateLines
  ].join("\n");
};
