import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse, RawAxiosRequestHeaders } from 'axios';
import crypto from 'crypto';
import FormData from 'form-data';
import {
  PlugBoletoPort,
  QueryParam,
  RequestOptions,
  TransportResponse,
  UploadFile,
} from '../../application/ports/driven/plugboleto-port.js';
import { Logger } from '../../application/ports/driven/logger-port.js';
import { envelopeSchema } from '../../application/schemas/plugboleto-envelope.schema.js';
import { Config, resolveBaseUrl } from '../../infrastructure/config/config.js';
import { PlugBoletoError } from '../../domain/errors/plugboleto-error.js';
import { PlugBoletoErrorCode } from '../../domain/enums/plugboleto-error-code.js';

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Serializa parâmetros como pares repetidos `nome=valor`
 * (ex.: `idintegracao=1&idintegracao=2`). Valores vazios são ignorados.
 */
export function buildQueryString(params: QueryParam[] = []): string {
  const search = new URLSearchParams();
  for (const param of params) {
    if (param.value === null || param.value === undefined || param.value === '') {
      continue;
    }
    search.append(param.name, String(param.value));
  }
  return search.toString();
}

function normalizePath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

function bufferFrom(data: unknown): Buffer | undefined {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (typeof data === 'string') {
    return Buffer.from(data);
  }
  return undefined;
}

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined && value !== null) {
      flat[key] = Array.isArray(value) ? value.join(', ') : String(value);
    }
  }
  return flat;
}

/**
 * Cliente HTTP da PlugBoleto (axios).
 *
 * Toda resposta HTTP é devolvida a quem chama, inclusive 4xx/5xx com envelope
 * de erro. Só falhas de transporte (rede, timeout, corpo não reconhecido em
 * resposta de erro) viram PlugBoletoError aqui.
 */
export class PlugBoletoHttpClient implements PlugBoletoPort {
  private api: AxiosInstance;
  readonly uploadMode: boolean;
  private readonly debug: boolean;

  constructor(config: Config, private logger: Logger) {
    this.uploadMode = config.plugboletoUpload;
    this.debug = config.plugboletoDebug;
    this.api = axios.create({
      baseURL: resolveBaseUrl(config),
      timeout: config.plugboletoTimeoutMs,
      headers: {
        'cnpj-sh': config.plugboletoCnpjSh,
        'token-sh': config.plugboletoTokenSh,
        'cnpj-cedente': config.plugboletoCnpjCedente,
        'Content-Type': 'application/json; charset=utf-8',
      },
      validateStatus: () => true,
    });
  }

  get(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('GET', path, undefined, options);
  }

  post(path: string, body: unknown, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('POST', path, body, options);
  }

  put(path: string, body: unknown, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('PUT', path, body, options);
  }

  delete(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.request('DELETE', path, undefined, options);
  }

  upload(path: string, file: UploadFile, options: RequestOptions = {}): Promise<TransportResponse> {
    const form = new FormData();
    form.append(file.field, file.content, {
      filename: file.filename,
      contentType: file.contentType ?? 'application/octet-stream',
    });

    return this.request('POST', path, form, {
      ...options,
      headers: { ...options.headers, ...form.getHeaders() },
    });
  }

  private async request(
    method: HttpMethod,
    path: string,
    body: unknown,
    options: RequestOptions
  ): Promise<TransportResponse> {
    const requestId = options.headers?.['X-Request-ID'] ?? crypto.randomUUID();
    const query = buildQueryString(options.params);
    const url = query ? `${normalizePath(path)}?${query}` : normalizePath(path);
    const raw = options.decode === false;

    const headers: RawAxiosRequestHeaders = { ...options.headers, 'X-Request-ID': requestId };
    const requestConfig: AxiosRequestConfig = {
      method,
      url,
      headers,
      data: body,
      responseType: raw ? 'arraybuffer' : 'json',
    };

    const startedAt = Date.now();

    try {
      const response = await this.api.request<unknown>(requestConfig);
      const durationMs = Date.now() - startedAt;
      const decoded = this.decodeBody(response.data, response.status, raw);

      this.logger.debug({ requestId, method, path, httpCode: response.status, durationMs }, 'Requisição PlugBoleto concluída');

      if ((response.status < 200 || response.status >= 300) && !envelopeSchema.safeParse(decoded).success) {
        throw new PlugBoletoError(
          `Resposta inesperada da PlugBoleto (HTTP ${response.status})`,
          PlugBoletoErrorCode.TRANSPORT_FAILURE,
          [],
          response.status
        );
      }

      const result: TransportResponse = { body: decoded, httpCode: response.status };
      if (this.debug) {
        result.diagnostics = {
          method,
          url,
          durationMs,
          requestId,
          responseHeaders: flattenHeaders(response.headers),
        };
      }
      return result;
    } catch (error) {
      if (error instanceof PlugBoletoError) {
        throw error;
      }

      const errorCode = this.mapErrorToCode(error);
      const statusCode = this.getStatusCode(error);
      const errorMessage = error instanceof Error ? error.message : 'Erro de comunicação com a PlugBoleto';

      this.logger.error({ requestId, method, path, code: errorCode, statusCode, error: errorMessage }, 'Falha na requisição PlugBoleto');

      throw new PlugBoletoError(
        `Falha de comunicação com a PlugBoleto: ${errorMessage}`,
        errorCode,
        [],
        statusCode
      );
    }
  }

  /**
   * Com `decode: false` o corpo fica como Buffer, exceto em HTTP diferente
   * de 200, que sempre traz JSON.
   */
  private decodeBody(data: unknown, status: number, raw: boolean): unknown {
    if (!raw) {
      return data;
    }
    const buffer = bufferFrom(data) ?? Buffer.alloc(0);
    return status === 200 ? buffer : decodeJson(buffer.toString('utf8'));
  }

  private mapErrorToCode(error: unknown): PlugBoletoErrorCode {
    if (axios.isAxiosError(error) && error.code === 'ERR_INVALID_URL') {
      return PlugBoletoErrorCode.VALIDATION_FAILED;
    }
    return PlugBoletoErrorCode.TRANSPORT_FAILURE;
  }

  private getStatusCode(error: unknown): number | undefined {
    if (axios.isAxiosError(error)) {
      return error.response?.status;
    }
    return undefined;
  }
}
