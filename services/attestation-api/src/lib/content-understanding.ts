/**
 * Content Understanding Client
 *
 * Sends the uploaded bytes to the analyzer's analyzeBinary operation and
 * polls the operation-location URL until the analysis succeeds, fails, or
 * the overall deadline passes.
 */

import {
  logger,
  getMessage,
  validateAnalysisResult,
  analysisDurationHistogram,
  ServiceCallError,
  ServiceHttpError,
  ServiceTimeoutError,
  SERVICE_NAMES,
  type DocumentAnalyzer,
  type Language,
  type RawAnalysisResult,
} from '@attestation/shared';

export interface ContentUnderstandingOptions {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  analyzerIds: Record<Language, string>;
  /** Deadline for submit + polling together */
  timeoutMs: number;
  pollIntervalMs: number;
}

const USER_AGENT = 'absence-attestation-validator';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readOperationStatus(body: unknown): string {
  return isRecord(body) && typeof body.status === 'string' ? body.status.toLowerCase() : '';
}

function readErrorInfo(body: unknown): { code?: string; message?: string } {
  if (!isRecord(body) || !isRecord(body.error)) return {};
  const { code, message } = body.error;
  return {
    code: typeof code === 'string' ? code : undefined,
    message: typeof message === 'string' ? message : undefined,
  };
}

export class ContentUnderstandingClient implements DocumentAnalyzer {
  private readonly endpoint: string;

  constructor(private readonly options: ContentUnderstandingOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
  }

  async analyze(file: Buffer, fileName: string, language: Language): Promise<RawAnalysisResult> {
    if (!this.endpoint) {
      throw new ServiceCallError(getMessage('analyzer_not_configured', language));
    }

    const analyzerId = this.options.analyzerIds[language];
    const deadline = Date.now() + this.options.timeoutMs;
    const startTime = Date.now();

    const analyzeUrl =
      `${this.endpoint}/contentunderstanding/analyzers/${encodeURIComponent(analyzerId)}:analyzeBinary` +
      `?api-version=${encodeURIComponent(this.options.apiVersion)}`;

    logger.info('Sending document to Content Understanding', {
      analyzer_id: analyzerId,
      size_bytes: file.length,
      file_name: fileName,
    });

    try {
      const response = await this.request(
        analyzeUrl,
        {
          method: 'POST',
          headers: { ...this.headers(), 'Content-Type': 'application/octet-stream' },
          body: new Uint8Array(file),
        },
        deadline
      );
      await this.raiseForStatus(response);

      const operationLocation = response.headers.get('operation-location');
      if (!operationLocation) {
        throw new ServiceCallError('No operation-location header in response');
      }

      const result = await this.pollResult(operationLocation, deadline);
      analysisDurationHistogram.observe({ status: 'success' }, (Date.now() - startTime) / 1000);
      return result;
    } catch (error) {
      analysisDurationHistogram.observe({ status: 'failure' }, (Date.now() - startTime) / 1000);
      throw error;
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'x-ms-useragent': USER_AGENT };
    if (this.options.apiKey) {
      headers['Ocp-Apim-Subscription-Key'] = this.options.apiKey;
    }
    return headers;
  }

  /**
   * fetch bounded by the time left until the deadline.
   */
  private async request(url: string, init: RequestInit, deadline: number): Promise<Response> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new ServiceTimeoutError(SERVICE_NAMES.ANALYZER, this.options.timeoutMs);
    }

    try {
      return await fetch(url, { ...init, signal: AbortSignal.timeout(remaining) });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new ServiceTimeoutError(SERVICE_NAMES.ANALYZER, this.options.timeoutMs);
      }
      throw error;
    }
  }

  private async pollResult(operationLocation: string, deadline: number): Promise<RawAnalysisResult> {
    logger.debug('Polling for analysis result', { operation_location: operationLocation });

    for (;;) {
      const response = await this.request(operationLocation, { method: 'GET', headers: this.headers() }, deadline);
      await this.raiseForStatus(response);

      const body: unknown = await response.json();
      const status = readOperationStatus(body);

      if (status === 'succeeded') {
        const validation = validateAnalysisResult(body);
        if (!validation.valid) {
          throw new ServiceCallError(`Invalid analysis payload: ${validation.errors.join('; ')}`);
        }
        logger.info('Document analysis completed');
        return validation.value;
      }

      if (status === 'failed') {
        const { message } = readErrorInfo(body);
        throw new ServiceCallError(`Analysis failed: ${message ?? 'Unknown error'}`);
      }

      logger.debug('Analysis in progress', { status });

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ServiceTimeoutError(SERVICE_NAMES.ANALYZER, this.options.timeoutMs);
      }
      await sleep(Math.min(this.options.pollIntervalMs, remaining));
    }
  }

  private async raiseForStatus(response: Response): Promise<void> {
    if (response.ok) return;

    let info: { code?: string; message?: string } = {};
    const text = await response.text();
    try {
      info = readErrorInfo(JSON.parse(text));
    } catch {
      info = { message: text.slice(0, 500) };
    }

    logger.warn('Content Understanding returned an error status', {
      status: response.status,
      error_code: info.code,
    });

    throw new ServiceHttpError(response.status, info.message || response.statusText || 'Request failed', info.code);
  }
}
