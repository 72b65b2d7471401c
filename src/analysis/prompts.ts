import type { AnalysisKind, PromptSet, SourceLanguage } from "../types.js";

export const ANALYSIS_KINDS: AnalysisKind[] = ["security", "quality", "refactor", "migrate"];

export const ANALYSIS_LABELS: Record<AnalysisKind, string> = {
  security: "Security analysis",
  quality: "Code quality analysis",
  refactor: "Refactored code",
  migrate: "Migration plan",
};

type PromptTemplate = (code: string, language: SourceLanguage) => string;

const SEVERITY_SCALE = "🔴 CRITICAL, 🟠 HIGH, 🟡 MEDIUM, 🟢 LOW";

const SECURITY_CHECKLIST = [
  "SQL Injection",
  "Hardcoded credentials/secrets",
  "Weak cryptography",
  "Input validation issues",
  "Information disclosure",
  "Authentication flaws",
  "Authorization issues",
];

function fenced(code: string, language: SourceLanguage): string {
  return `\`\`\`${language.fence}\n${code}\n\`\`\``;
}

function numbered(items: string[]): string {
  return items.map((item, index) => `${index + 1}. ${item}`).join("\n");
}

function languageLabel(language: SourceLanguage): string {
  return language.name === "source" ? "this language's" : language.name;
}

const CLI_TEMPLATES: Record<AnalysisKind, PromptTemplate> = {
  security: (code, language) => `You are a senior security engineer performing a security audit.

Analyze this code for security vulnerabilities:

${fenced(code, language)}

Identify ALL security issues including:
${numbered(SECURITY_CHECKLIST)}

For EACH finding, provide:
- Severity: ${SEVERITY_SCALE}
- Line number(s)
- Vulnerability type
- Description
- Secure code fix

Format as a clear security report.`,

  quality: (code, language) => `You are a senior software architect reviewing legacy code for modernization.

Analyze this code for quality issues:

${fenced(code, language)}

Identify:
1. **Code Smells** - Long methods, god classes, magic numbers
2. **Outdated Patterns** - Callbacks that should be async/await, old string formatting
3. **Missing Best Practices** - Missing types, missing docs, poor error handling
4. **SOLID Violations** - Single responsibility, dependency injection issues
5. **Testability Issues** - Tight coupling, no interfaces

For each issue:
- Location (line number)
- Issue type
- Why it's a problem
- Modern ${languageLabel(language)} solution

Be specific and actionable.`,

  refactor: (code, language) => `You are a ${language.name === "source" ? "software" : language.name} modernization expert.

Refactor this legacy code to modern ${languageLabel(language)} standards:

ORIGINAL CODE:
${fenced(code, language)}

Requirements:
1. Fix ALL security vulnerabilities (use parameterized queries, env vars for secrets)
2. Add type annotations to all functions
3. Convert callbacks to async/await where applicable
4. Add proper error handling with specific exceptions
5. Add documentation comments
6. Break down god methods into smaller functions
7. Use typed data structures instead of loose dictionaries
8. Follow the language's standard style guide

Output ONLY the refactored code, no explanations.
Include comments showing what was changed.`,

  migrate: (code, language) => `You are a technical lead planning a legacy code migration.

Analyze this codebase for migration to modern architecture:

${fenced(code, language)}

Provide a migration plan including:

## 1. Current State Assessment
- Tech debt items
- Risk areas
- Dependencies

## 2. Target Architecture
- Recommended patterns (Repository, Service Layer, etc.)
- Framework recommendations
- Testing strategy

## 3. Migration Phases
- Phase 1: Quick wins (what can be fixed immediately)
- Phase 2: Refactoring (structural changes)
- Phase 3: Modernization (new patterns/frameworks)

## 4. Effort Estimation
- Small (1-2 days)
- Medium (1 week)
- Large (2+ weeks)

## 5. Risk Mitigation
- How to migrate safely without breaking production

Be specific to THIS codebase.`,
};

const PR_TEMPLATES: Record<AnalysisKind, PromptTemplate> = {
  security: (code, language) => `You are a senior security engineer performing a security audit.

Analyze this code for security vulnerabilities:

${fenced(code, language)}

Identify ALL security issues including:
${numbered(SECURITY_CHECKLIST)}

For EACH finding, provide:
- Severity: ${SEVERITY_SCALE}
- Line number(s)
- Vulnerability type
- Description
- Secure code fix

Be concise but thorough.`,

  quality: (code, language) => `You are a senior software architect reviewing code for quality.

Analyze this code for quality issues:

${fenced(code, language)}

Identify:
1. **Code Smells** - Long methods, god classes, magic numbers
2. **Outdated Patterns** - Old practices that should be modernized
3. **Missing Best Practices** - Missing types, missing docs, poor error handling
4. **SOLID Violations** - Single responsibility, dependency injection issues
5. **Testability Issues** - Tight coupling, no interfaces

For each issue provide:
- Location (line number)
- Issue type
- Why it's a problem
- Quick fix suggestion

Be concise but actionable.`,

  migrate: (code, language) => `You are a technical lead assessing code for modernization.

Analyze this code for migration needs:

${fenced(code, language)}

Provide a brief migration assessment:
1. **Tech Debt Score** (1-10, 10 = severe debt)
2. **Top 3 Priority Fixes**
3. **Recommended Modern Patterns**
4. **Effort Estimate** (Small/Medium/Large)

Be concise - this is for a PR comment.`,

  refactor: (code, language) => `You are a ${language.name === "source" ? "software" : language.name} expert suggesting quick refactoring wins.

Review this code:

${fenced(code, language)}

Suggest the TOP 3 most impactful refactoring improvements:
1. What to change
2. Why it matters
3. Brief code snippet showing the improvement

Keep suggestions actionable for a PR review.`,
};

const PROMPT_SETS: Record<PromptSet, Record<AnalysisKind, PromptTemplate>> = {
  cli: CLI_TEMPLATES,
  pr: PR_TEMPLATES,
};

export function renderPrompt(set: PromptSet, kind: AnalysisKind, code: string, language: SourceLanguage): string {
  return PROMPT_SETS[set][kind](code, language);
}
