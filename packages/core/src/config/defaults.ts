// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Built-in lexicons and labels. Every value here can be overridden from edugate.yaml.
 */

export const NON_EDUCATIONAL_KEYWORDS = [
  "movie",
  "theft",
  "robbery",
  "netflix",
  "watch",
  "download",
  "shopping",
  "travel",
  "celebrity",
  "repair my",
  "fix my",
  "broken",
  "not working",
  "how much to repair",
  "where to fix",
  "price of",
  "how much does",
  "cost of",
  "which phone",
  "which mobile",
  "which game",
  "best ice cream",
  "recommend a",
  "which brand",
  "better option",
  "should i buy",
  "top rated",
];

export const EDUCATIONAL_KEYWORDS = [
  "explain",
  "how",
  "science",
  "language",
  "history",
  "scientific",
  "logic",
  "architecture",
  "design principles",
  "engineering",
  "teach me",
  "learning",
  "pedagogy",
  "types of",
  "list of",
  "classification of",
  "define",
  "difference between",
];

export const EDUCATIONAL_LABEL =
  "educational: factual knowledge, explanations, technology, critical thinking, science, maths, " +
  "sports, coding, general knowledge, or academic concepts";

export const NON_EDUCATIONAL_LABEL =
  "non-educational: requests product comparisons, unsafe, Consumer Product Advice, shopping advice, " +
  "entertainment, random_fun, plant_motivation, absurd_request, gaming, or personal opinions";

export const DISSATISFACTION_TRIGGERS = [
  "not satisfied",
  "explain better",
  "more detail",
  "incomplete answer",
];

export const TECHNICAL_TRIGGERS = [
  "explain in detail",
  "step-by-step",
  "prove that",
  "compare and contrast",
];

export const APOLOGY_MESSAGE =
  "I apologize, but I encountered an error while generating a response.";

export const SYSTEM_PROMPT = `You are an expert educational assistant named EduGate Tutor. Provide clean, well-structured, and direct answers.
- Use bold text for key terms.
- Use bullet points or numbered lists where appropriate for clarity.
- Do not repeat the user's question in your response.
`;
