/**
 * Tool Schemas
 *
 * The closed set of tool calls. Each variant pairs a tool name with its
 * argument record; parseToolCall() is the only way in from untyped input.
 */

import { z } from 'zod';

const httpUrl = z
  .string()
  .url()
  .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
    message: 'URL must start with http:// or https://',
  });

const sessionName = z.string().min(1).max(128);

const fileName = z
  .string()
  .min(1)
  .refine((name) => !/[\\/]/.test(name) && name !== '.' && name !== '..', {
    message: 'filename must not contain path separators',
  });

export const toolCallSchema = z.discriminatedUnion('tool', [
  z.object({ tool: z.literal('fetch_url'), args: z.object({ url: httpUrl }) }),
  z.object({ tool: z.literal('fetch_json'), args: z.object({ url: httpUrl }) }),
  z.object({
    tool: z.literal('download_file'),
    args: z.object({ url: httpUrl, filename: fileName }),
  }),
  z.object({ tool: z.literal('batch_fetch'), args: z.object({ urls: z.array(httpUrl).min(1) }) }),
  z.object({ tool: z.literal('browser_navigate'), args: z.object({ url: httpUrl }) }),
  z.object({
    tool: z.literal('browser_save_session'),
    args: z.object({ name: sessionName.default('default') }),
  }),
  z.object({
    tool: z.literal('browser_load_session'),
    args: z.object({ name: sessionName.default('default'), auto_navigate: z.boolean().default(false) }),
  }),
  z.object({ tool: z.literal('browser_list_sessions'), args: z.object({}) }),
  z.object({ tool: z.literal('browser_delete_session'), args: z.object({ name: sessionName }) }),
  z.object({ tool: z.literal('browser_network_summary'), args: z.object({}) }),
  z.object({
    tool: z.literal('browser_export_har'),
    args: z.object({ filename: fileName.default('network.har') }),
  }),
]);

export type ToolCall = z.infer<typeof toolCallSchema>;
export type ToolName = ToolCall['tool'];

export const TOOL_NAMES: readonly ToolName[] = toolCallSchema.options.map(
  (option) => option.shape.tool.value
);

export const TOOL_DESCRIPTIONS: Readonly<Record<ToolName, string>> = {
  fetch_url: 'Fetch a URL without certificate checks; returns status, headers and up to 1000 chars of content',
  fetch_json: 'Fetch a URL and parse the body as JSON',
  download_file: 'Download a URL into the downloads directory under the given filename',
  batch_fetch: 'Fetch several URLs concurrently; results keep the input order',
  browser_navigate: 'Navigate the browser to a URL',
  browser_save_session: 'Save the browser cookies and current URL under a session name (default: default)',
  browser_load_session: 'Restore cookies from a saved session; navigates to the saved URL only with auto_navigate',
  browser_list_sessions: 'List saved sessions with cookie counts and domains',
  browser_delete_session: 'Delete a saved session',
  browser_network_summary: 'Request/response counts and the most recent events',
  browser_export_har: 'Write recorded network activity as a HAR file (default: network.har)',
};

export type ParseToolCallResult =
  | { ok: true; call: ToolCall }
  | { ok: false; error: string };

function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((known) => known === name);
}

export function parseToolCall(name: string, args: unknown): ParseToolCallResult {
  if (!isToolName(name)) {
    return { ok: false, error: `Unknown tool: ${name}` };
  }
  const parsed = toolCallSchema.safeParse({ tool: name, args: args ?? {} });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.filter((part) => part !== 'args').join('.') || 'args'}: ${issue.message}`
    );
    return { ok: false, error: `Invalid arguments for ${name}: ${issues.join('; ')}` };
  }
  return { ok: true, call: parsed.data };
}
