/**
 * Tool Dispatch
 *
 * dispatchTool() is one exhaustive switch over ToolCall. handleToolCall()
 * is the entry for untyped input: every failure, expected or not, comes
 * back from it as an error response.
 */

import { logger } from '../utils/logger.js';
import { batchFetch, summarizeBatch } from '../core/batch-coordinator.js';
import type { BridgeRuntime } from '../runtime.js';
import { parseToolCall, type ToolCall } from './tool-schemas.js';
import {
  BATCH_PREVIEW_CHARS,
  errorResponse,
  FETCH_PREVIEW_CHARS,
  formatFetchResult,
  jsonResponse,
  truncate,
  type ToolResponse,
} from './response-formatters.js';

const log = logger.tools;

const NO_BROWSER_MESSAGE = 'No browser session active. Navigate to a page first.';

function assertNever(value: never): never {
  throw new Error(`Unhandled tool call: ${JSON.stringify(value)}`);
}

export async function dispatchTool(call: ToolCall, runtime: BridgeRuntime): Promise<ToolResponse> {
  switch (call.tool) {
    case 'fetch_url': {
      const result = await runtime.engine.fetch(call.args.url);
      const body = formatFetchResult(result, FETCH_PREVIEW_CHARS);
      return result.success ? jsonResponse(body) : errorResponse(result.kind, result.error, body);
    }

    case 'fetch_json': {
      const result = await runtime.engine.fetchJson(call.args.url);
      if (!result.success) {
        return errorResponse(result.kind, result.error, {
          url: result.url,
          attempts: result.attempts,
          ...('fetch' in result && { status: result.fetch.status }),
        });
      }
      const preview = truncate(JSON.stringify(result.json, null, 2), FETCH_PREVIEW_CHARS);
      return jsonResponse({
        success: true,
        url: result.url,
        status: result.status,
        attempts: result.attempts,
        json: preview.truncated ? preview.text : result.json,
        ...(preview.truncated && { json_truncated: true }),
      });
    }

    case 'download_file': {
      const request = runtime.engine.buildDownloadRequest(
        call.args.url,
        runtime.resolveDownloadPath(call.args.filename),
        { showProgress: true }
      );
      const result = await runtime.engine.download(request);
      if (!result.success) {
        return errorResponse(result.kind, result.error, { url: result.url, outputPath: result.outputPath });
      }
      return jsonResponse({
        success: true,
        url: result.url,
        status: result.status,
        outputPath: result.outputPath,
        bytesWritten: result.bytesWritten,
        elapsedMs: result.elapsedMs,
        message: `Downloaded ${result.bytesWritten} bytes to ${result.outputPath}`,
      });
    }

    case 'batch_fetch': {
      const results = await batchFetch(runtime.engine, call.args.urls);
      return jsonResponse({
        ...summarizeBatch(results),
        results: results.map((result) => formatFetchResult(result, BATCH_PREVIEW_CHARS)),
      });
    }

    case 'browser_navigate': {
      const navigation = await runtime.getBrowser().navigate(call.args.url);
      return jsonResponse({ success: true, ...navigation });
    }

    case 'browser_save_session': {
      const browser = runtime.activeBrowser();
      if (!browser) {
        return errorResponse('NoBrowser', NO_BROWSER_MESSAGE);
      }
      const result = await browser.saveSession(call.args.name);
      if (!result.saved) {
        return errorResponse(result.kind, result.error, { name: result.name });
      }
      return jsonResponse({
        success: true,
        path: result.path,
        name: result.record.name,
        cookieCount: result.record.cookie_count,
        domains: result.record.domains,
      });
    }

    case 'browser_load_session': {
      const result = await runtime
        .getBrowser()
        .loadSession(call.args.name, { autoNavigate: call.args.auto_navigate });
      if (!result.loaded) {
        const message =
          result.failure.kind === 'NotFound'
            ? `Session not found: ${result.failure.name}`
            : result.failure.error;
        return errorResponse(result.failure.kind, message, { name: result.failure.name });
      }
      return jsonResponse({
        success: true,
        ...result.session,
        ...(result.navigatedTo && { navigatedTo: result.navigatedTo }),
      });
    }

    case 'browser_list_sessions': {
      const result = await runtime.sessions.listDetailed();
      if (!result.ok) {
        return errorResponse(result.kind, `Cannot list sessions: ${result.error}`);
      }
      return jsonResponse({ count: result.sessions.length, sessions: result.sessions });
    }

    case 'browser_delete_session': {
      const result = await runtime.sessions.delete(call.args.name);
      if (!result.deleted && result.kind === 'IOFailure') {
        return errorResponse(result.kind, `Cannot delete session: ${result.error}`, { name: result.name });
      }
      return jsonResponse({ success: result.deleted, name: result.name, deleted: result.deleted });
    }

    case 'browser_network_summary':
      return jsonResponse(runtime.recorder.summary());

    case 'browser_export_har': {
      const written = await runtime.recorder.writeTrace(runtime.resolveDownloadPath(call.args.filename));
      return jsonResponse({ success: true, path: written });
    }

    default:
      return assertNever(call);
  }
}

/**
 * Validate untyped input, dispatch, and turn anything thrown into an
 * error response
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  runtime: BridgeRuntime
): Promise<ToolResponse> {
  const parsed = parseToolCall(name, args);
  if (!parsed.ok) {
    return errorResponse('InvalidArguments', parsed.error);
  }

  const startTime = Date.now();
  try {
    const response = await dispatchTool(parsed.call, runtime);
    log.timed('Tool call complete', startTime, { tool: name, isError: response.isError ?? false });
    return response;
  } catch (error) {
    log.error('Tool call failed', { tool: name, error });
    const message = error instanceof Error ? error.message : String(error);
    const kind = error instanceof Error ? error.name : 'Error';
    return errorResponse(kind, message);
  }
}
