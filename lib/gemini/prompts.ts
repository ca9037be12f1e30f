export const DEFAULT_QUESTION_COUNT = 10;

const EXAMPLE_QUESTIONS = [
  [
    "Example 1:",
    "1. What is the time complexity of inserting an element into a binary max-heap?",
    "    A. O(log n)",
    "    B. O(1)",
    "    C. O(n log n)",
    "    D. O(n²)",
    "Answer: A",
  ],
  [
    "Example 2:",
    "2. Which of the following is NOT a typical use of a hash table?",
    "    A. Implementing a dictionary",
    "    B. Storing hierarchical data such as an XML tree",
    "    C. Caching computed results",
    "    D. Detecting duplicates in a list",
    "Answer: B",
  ],
  [
    "Example 3:",
    '3. In supervised learning, which option best describes the "training dataset"?',
    "    A. Data used only to measure the final model's accuracy",
    "    B. Input-output pairs used to fit the model",
    "    C. Input features without any labels",
    "    D. Records collected from live user sessions",
    "Answer: B",
  ],
];

const OUTPUT_FORMAT = [
  "1. Question?",
  "    A. Option1",
  "    B. Option2",
  "    C. Option3",
  "    D. Option4",
  "Answer: A",
];

function getTaskRules() {
  return [
    "Your task is to:",
    "- Understand the core concepts taught in the transcript of a YouTube video.",
    "- Write concept-based MCQs suitable for undergraduate engineering and Computer Science students.",
    '- Never refer to the source directly (no "according to the transcript", "according to the text", "according to the video" or "as stated above").',
    "- Make the questions read naturally, as they would on an exam.",
    "",
    "Each question must:",
    "- Be clear and technically accurate.",
    "- Have exactly one correct answer and three plausible but wrong distractors.",
    "- Target medium difficulty.",
    "- Stay within undergraduate topics such as programming, data structures, algorithms, machine learning, engineering mathematics, physics, chemistry and electronics.",
  ].join("\n");
}

export function buildQuizPrompt(transcript: string, questionCount = DEFAULT_QUESTION_COUNT): string {
  return [
    "You are an AI assistant that writes high-quality, professional multiple-choice questions (MCQs) from educational video content.",
    "",
    getTaskRules(),
    "",
    "---",
    "",
    "Here are some example questions for reference:",
    "",
    EXAMPLE_QUESTIONS.map((lines) => lines.join("\n")).join("\n\n"),
    "",
    "---",
    "",
    `Now, generate ${questionCount} MCQs based on the following transcript:`,
    "",
    "Transcript:",
    '"""',
    transcript,
    '"""',
    "",
    "Output format:",
    OUTPUT_FORMAT.join("\n"),
  ].join("\n");
}
