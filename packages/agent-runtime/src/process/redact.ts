/**
 * Credential handling for child environments and captured output.
 */

/** Environment variables that carry credentials. */
export const SENSITIVE_ENV_VARS: ReadonlySet<string> = new Set([
  'OPENAI_API_KEY',
  'OPENAI_ORG_ID',
  'ANTHROPIC_API_KEY',
  'CLAUDE_API_KEY',
  'GOOGLE_API_KEY',
  'GEMINI_API_KEY',
  'GOOGLE_APPLICATION_CREDENTIALS',
  'GITHUB_TOKEN',
  'GH_TOKEN',
  'GITHUB_PAT',
  'OPENROUTER_KEY',
  'OPENROUTER_API_KEY',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
  'AZURE_API_KEY',
  'AZURE_OPENAI_API_KEY',
  'HUGGINGFACE_TOKEN',
  'HF_TOKEN',
  'WANDB_API_KEY',
  'REPLICATE_API_TOKEN',
]);

const ASSIGNED_NAMES =
  'OPENAI_API_KEY|ANTHROPIC_API_KEY|GITHUB_TOKEN|GEMINI_API_KEY|GOOGLE_API_KEY|OPENROUTER_KEY|HF_TOKEN';

// Order matters: the more specific `sk-` shapes must run before the generic one.
const KEY_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/sk-ant-[A-Za-z0-9_-]{20,}/g, '[REDACTED_ANTHROPIC_KEY]'],
  [/sk-proj-[A-Za-z0-9_-]{20,}/g, '[REDACTED_OPENAI_PROJECT_KEY]'],
  [/sk-or-v1-[A-Za-z0-9_-]{20,}/g, '[REDACTED_OPENROUTER_KEY]'],
  [/sk-[A-Za-z0-9]{48,}/g, '[REDACTED_OPENAI_KEY]'],
  [/ghp_[A-Za-z0-9]{36,}/g, '[REDACTED_GITHUB_PAT]'],
  [/gho_[A-Za-z0-9]{36,}/g, '[REDACTED_GITHUB_OAUTH]'],
  [/ghs_[A-Za-z0-9]{36,}/g, '[REDACTED_GITHUB_APP]'],
  [/github_pat_[A-Za-z0-9_]{20,}/g, '[REDACTED_GITHUB_FINE_GRAINED]'],
  [/AIza[A-Za-z0-9_-]{35,}/g, '[REDACTED_GOOGLE_KEY]'],
  [/AKIA[A-Z0-9]{16}/g, '[REDACTED_AWS_ACCESS_KEY]'],
  [/hf_[A-Za-z0-9]{30,}/g, '[REDACTED_HF_TOKEN]'],
  [new RegExp(`\\b(${ASSIGNED_NAMES})=[^\\s"']+`, 'g'), '$1=[REDACTED]'],
];

/**
 * Replace anything that looks like a credential with a placeholder.
 */
export function redactSecrets(text: string): string {
  let result = text;
  for (const [pattern, replacement] of KEY_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

/**
 * Strip VS Code IPC environment variables to ensure truly headless execution.
 */
export function stripEditorEnv(env: Record<string, string | undefined>): Record<string, string | undefined> {
  const stripped = { ...env };
  const prefixes = ['VSCODE_', 'ELECTRON_', 'TERM_PROGRAM_VERSION', 'ORIGINAL_XDG_CURRENT_DESKTOP'];
  for (const key of Object.keys(stripped)) {
    if (prefixes.some((p) => key.startsWith(p))) {
      delete stripped[key];
    }
  }
  return stripped;
}

/**
 * Remove credential variables (matched case-insensitively).
 */
export function scrubSecretEnv(env: Record<string, string | undefined>): Record<string, string | undefined> {
  const scrubbed: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!SENSITIVE_ENV_VARS.has(key.toUpperCase())) {
      scrubbed[key] = value;
    }
  }
  return scrubbed;
}
