import path from "node:path";

export const DEFAULT_MAX_PROMPT_CHARS = 10_000;

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  ".py": "python",
  ".js": "javascript",
  ".mjs": "javascript",
  ".ts": "typescript",
  ".tsx": "tsx",
  ".java": "java",
  ".go": "go",
  ".rs": "rust",
  ".rb": "ruby",
  ".c": "c",
  ".h": "c",
  ".cpp": "cpp",
  ".cs": "csharp",
  ".md": "markdown",
  ".toml": "toml",
  ".yml": "yaml",
  ".yaml": "yaml",
};

export function languageForPath(filePath: string): string {
  return LANGUAGE_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? "";
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Cuts at `maxChars` UTF-16 units, backing off one unit rather than splitting a surrogate pair. */
export function truncateForPrompt(text: string, maxChars = DEFAULT_MAX_PROMPT_CHARS): string {
  if (text.length <= maxChars) {
    return text;
  }
  const end = maxChars > 0 && isHighSurrogate(text.charCodeAt(maxChars - 1)) ? maxChars - 1 : maxChars;
  return text.slice(0, end);
}

const COMPARISON_TEMPLATE = {
  similarity_percentage: "int 0-100",
  refactoring_level: "none|low|medium|high",
  added_features: "bool",
  removed_features: "bool",
  notes: "string",
  quality_issues: [
    {
      issue_type: "string",
      severity: "low|medium|high",
      description: "string",
      suggestion: "string",
    },
  ],
};

const QUALITY_TEMPLATE = {
  issues: [
    {
      type: "string",
      severity: "low|medium|high",
      description: "string",
      recommendation: "string",
      tool_missed: "bool",
    },
  ],
};

export function buildComparisonPrompt(
  originalText: string,
  variantText: string,
  maxChars = DEFAULT_MAX_PROMPT_CHARS,
): string {
  return [
    "Compare the following two versions of a source file semantically and report:",
    "1. A similarity percentage (0-100).",
    "2. How much the fork refactored the original (none, low, medium, high).",
    "3. Whether the fork added or removed features.",
    "4. A short description of the changes.",
    "5. Any code-quality issues the fork introduced.",
    "",
    "ORIGINAL:",
    "```",
    truncateForPrompt(originalText, maxChars),
    "```",
    "",
    "FORK VERSION:",
    "```",
    truncateForPrompt(variantText, maxChars),
    "```",
    "",
    "Return ONLY a JSON object shaped like this template, with no prose before or after it:",
    JSON.stringify(COMPARISON_TEMPLATE, null, 2),
  ].join("\n");
}

export function buildQualityPrompt(code: string, language = "", maxChars = DEFAULT_MAX_PROMPT_CHARS): string {
  return [
    "Analyze this code for quality issues that static analysis tools are likely to miss:",
    "1. Architectural smells",
    "2. Testability issues",
    "3. Hidden bugs",
    "4. Security vulnerabilities",
    "5. Code smells",
    "",
    "Code:",
    `\`\`\`${language}`,
    truncateForPrompt(code, maxChars),
    "```",
    "",
    "Return ONLY a JSON object shaped like this template:",
    JSON.stringify(QUALITY_TEMPLATE, null, 2),
  ].join("\n");
}
