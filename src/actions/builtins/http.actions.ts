import { StepResult } from '../../types/index.js';
import type { StepDefinition } from '../../types/index.js';
import type { HttpRequest, HttpResponse } from '../../engines/page-driver.js';
import type { ActionDefinition } from '../action-types.js';
import type { ExecutionVariables } from '../../variables/execution-variables.js';
import { isPlainObject, resolveTemplate, resolveValue, stringifyVariable } from '../../scenario/template.js';
import { jsonPathGet } from '../../scenario/json-path.js';
import {
  booleanField,
  booleanOrNull,
  integerOrNull,
  numberOrNull,
  parseJsonObject,
  pickDefined,
  pickField,
  stringRecord,
  templateField,
} from '../step-fields.js';

/** Fields from `options_json` / `options`, overridden by the step's own non-null fields. */
export function mergeRequestOptions(step: StepDefinition, vars: ExecutionVariables): StepDefinition {
  const options = parseJsonObject(pickField(step, 'options_json', 'options'), vars) ?? {};
  const merged: StepDefinition = { ...options, action: step.action };
  for (const [key, value] of Object.entries(step)) {
    if (value !== null && value !== undefined) merged[key] = value;
  }
  return merged;
}

export function buildHttpRequest(url: string, step: StepDefinition, vars: ExecutionVariables): HttpRequest {
  const method = (templateField(step, vars, 'method', 'http_method') || 'GET').trim().toUpperCase() || 'GET';

  const rawParams = pickField(step, 'params', 'query', 'query_params');
  const params = typeof rawParams === 'string' && parseJsonObject(rawParams, vars) === null
    ? resolveTemplate(rawParams, vars)
    : stringRecord(rawParams, vars);

  const multipartSource = parseJsonObject(step.multipart, vars) ?? step.multipart;
  const multipart = resolveValue(multipartSource, vars);

  return {
    url,
    method,
    headers: stringRecord(step.headers, vars),
    params,
    data: resolveValue(pickDefined(step, 'data', 'json', 'body'), vars),
    form: stringRecord(step.form, vars),
    multipart: isPlainObject(multipart) ? multipart : null,
    timeoutMs: numberOrNull(step.timeout_ms),
    failOnStatusCode: booleanOrNull(step.fail_on_status_code),
    ignoreHttpsErrors: booleanOrNull(step.ignore_https_errors),
    maxRedirects: integerOrNull(step.max_redirects),
    maxRetries: integerOrNull(step.max_retries),
  };
}

function jsonText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Copy the response into `<prefix>_*`, the response variable and `extract_json` targets. */
export function storeHttpResponse(
  url: string,
  step: StepDefinition,
  response: HttpResponse,
  vars: ExecutionVariables,
): void {
  const prefix = (templateField(step, vars, 'save_as', 'result_prefix', 'prefix', 'var_prefix') || 'http').trim();
  if (prefix) {
    vars.set(`${prefix}_url`, url);
    vars.set(`${prefix}_status`, String(response.status));
    vars.set(`${prefix}_ok`, response.ok ? 'true' : 'false');
    vars.set(`${prefix}_headers`, JSON.stringify(response.headers));
    vars.set(`${prefix}_body`, response.body);
    vars.set(`${prefix}_json`, response.json === undefined ? '' : JSON.stringify(response.json));
  }

  const responseVar = templateField(step, vars, 'response_var', 'to_var').trim();
  if (responseVar) {
    const payload: Record<string, unknown> = {
      url,
      status: response.status,
      ok: response.ok,
      headers: response.headers,
      body: response.body,
    };
    if (response.json !== undefined) payload.json = response.json;
    vars.set(responseVar, JSON.stringify(payload));
  }

  const rawExtract = pickField(step, 'extract_json', 'json_extract');
  const extract = parseJsonObject(rawExtract, vars);
  if (extract && response.json !== undefined) {
    for (const [varName, path] of Object.entries(extract)) {
      if (!varName) continue;
      const resolvedPath = resolveTemplate(stringifyVariable(path), vars);
      vars.set(varName, jsonText(jsonPathGet(response.json, resolvedPath)));
    }
  }
}

export const httpRequestAction: ActionDefinition = {
  kind: 'http_request',
  description: 'Send an HTTP request through the browser context and store the response.',
  handler: async ({ definition }, ctx) => {
    const url = templateField(definition, ctx.variables, 'value', 'url').trim();
    if (!url) return StepResult.stop('URL is required for http_request');

    const step = mergeRequestOptions(definition, ctx.variables);
    const request = buildHttpRequest(url, step, ctx.variables);
    const response = await ctx.driver.http(request);
    storeHttpResponse(url, step, response, ctx.variables);

    if (booleanField(step.require_success, false) && !response.ok) {
      return StepResult.stop(`http_request failed with status ${response.status}`);
    }
    await ctx.variables.persist();
    ctx.logger.info(`HTTP ${request.method} ${url} -> ${response.status}`);
    return StepResult.next();
  },
};

export const httpActions: ActionDefinition[] = [httpRequestAction];

