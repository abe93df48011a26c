import { z } from 'zod';
import type { CliProviderConfig } from '../config';

export type CliKind = CliProviderConfig['kind'];

/** `framed` is false when the text is raw stdout rather than the tool's structured answer. */
export type ParsedOutput = { ok: true; text: string; framed: boolean } | { ok: false; reason: string };

export interface Invocation {
  args: string[];
  /** Delivered on stdin. */
  input?: string;
}

/** How one command-line assistant is invoked and how its answer is pulled out of stdout. */
export interface CliTool {
  readonly kind: CliKind;
  invocation(prompt: string, model: string): Invocation;
  parse(stdout: string): ParsedOutput;
}

// CSI sequences plus the OSC hyperlink/title form
const ANSI_PATTERN = /\u001b\[[0-?]*[ -/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/** First JSON object in `text`, tolerating log lines before or after it. */
export function extractJsonObject(text: string): unknown {
  const trimmed = text.trim();
  const direct = tryParse(trimmed);
  if (direct !== undefined) return direct;

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start < 0 || end <= start) return undefined;
  return tryParse(trimmed.slice(start, end + 1));
}

function tryParse(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function rawFallback(text: string): ParsedOutput {
  const trimmed = text.trim();
  return trimmed ? { ok: true, text: trimmed, framed: false } : { ok: false, reason: 'empty output' };
}

function answer(text: string, what: string): ParsedOutput {
  const trimmed = text.trim();
  return trimmed ? { ok: true, text: trimmed, framed: true } : { ok: false, reason: `empty ${what}` };
}

const claudeResultSchema = z.object({
  result: z.string(),
  is_error: z.boolean().optional(),
});

export const claudeCode: CliTool = {
  kind: 'claude_code',
  invocation(prompt, model) {
    const args = ['-p', '--output-format', 'json'];
    if (model) args.push('--model', model);
    return { args, input: prompt };
  },
  parse(stdout) {
    const clean = stripAnsi(stdout);
    const json = extractJsonObject(clean);
    if (json === undefined) return rawFallback(clean);
    const parsed = claudeResultSchema.safeParse(json);
    if (!parsed.success) return { ok: false, reason: 'JSON output has no `result` field' };
    if (parsed.data.is_error) return { ok: false, reason: `tool reported an error: ${parsed.data.result.trim()}` };
    return answer(parsed.data.result, 'result');
  },
};

const geminiResponseSchema = z.object({
  response: z.string(),
});

// credential and telemetry notices printed ahead of the answer
const GEMINI_LOG_LINE = /^(Loaded cached credentials|Data collection is disabled|\[[A-Z]+\])/;

export const geminiCli: CliTool = {
  kind: 'gemini_cli',
  invocation(prompt, model) {
    const args: string[] = [];
    if (model) args.push('-m', model);
    args.push('-o', 'json');
    return { args, input: prompt };
  },
  parse(stdout) {
    const clean = stripAnsi(stdout)
      .split('\n')
      .filter((line) => !GEMINI_LOG_LINE.test(line.trim()))
      .join('\n');
    const json = extractJsonObject(clean);
    if (json === undefined) return rawFallback(clean);
    const parsed = geminiResponseSchema.safeParse(json);
    if (!parsed.success) return { ok: false, reason: 'JSON output has no `response` field' };
    return answer(parsed.data.response, 'response');
  },
};

const codexEventSchema = z.object({
  type: z.string().optional(),
  item: z
    .object({
      type: z.string().optional(),
      text: z.string().optional(),
      content: z.array(z.object({ text: z.string().optional() })).optional(),
    })
    .optional(),
});

const AGENT_ITEM_TYPES = new Set(['agent_message', 'assistant_message', 'message']);

export const codex: CliTool = {
  kind: 'codex',
  invocation(prompt, model) {
    const args = ['exec', '--json', '--skip-git-repo-check'];
    if (model) args.push('-m', model);
    args.push('-');
    return { args, input: prompt };
  },
  parse(stdout) {
    const clean = stripAnsi(stdout);
    let sawEvent = false;
    let last: string | undefined;

    for (const line of clean.split('\n')) {
      const json = tryParse(line.trim());
      if (json === undefined) continue;
      const event = codexEventSchema.safeParse(json);
      if (!event.success) continue;
      sawEvent = true;

      const item = event.data.item;
      if (!item || !item.type || !AGENT_ITEM_TYPES.has(item.type)) continue;
      const text = item.text ?? (item.content ?? []).map((part) => part.text ?? '').join('');
      if (text.trim()) last = text;
    }

    if (!sawEvent) return rawFallback(clean);
    if (last === undefined) return { ok: false, reason: 'no agent message in event stream' };
    return answer(last, 'agent message');
  },
};

export const CLI_TOOLS: Record<CliKind, CliTool> = {
  claude_code: claudeCode,
  gemini_cli: geminiCli,
  codex,
};
