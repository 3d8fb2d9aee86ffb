/**
 * Port: Cliente de transporte da PlugBoleto
 *
 * Executa as requisições HTTP e devolve o corpo decodificado. Não interpreta o
 * envelope de resposta: essa decisão fica com quem chama.
 */

export interface QueryParam {
  name: string;
  value: string | number | null | undefined;
}

export interface RequestOptions {
  params?: QueryParam[];
  headers?: Record<string, string>;
  /**
   * Quando false, o corpo é devolvido como Buffer (ex.: PDF de impressão).
   * Respostas com HTTP diferente de 200 são sempre decodificadas.
   */
  decode?: boolean;
}

export interface TransportDiagnostics {
  method: string;
  url: string;
  durationMs: number;
  requestId: string;
  responseHeaders: Record<string, string>;
}

export interface TransportResponse {
  /** JSON decodificado ou Buffer quando `decode: false` */
  body: unknown;
  httpCode: number;
  diagnostics?: TransportDiagnostics;
}

export interface UploadFile {
  field: string;
  filename: string;
  content: Buffer | string;
  contentType?: string;
}

export interface PlugBoletoPort {
  get(path: string, options?: RequestOptions): Promise<TransportResponse>;
  post(path: string, body: unknown, options?: RequestOptions): Promise<TransportResponse>;
  put(path: string, body: unknown, options?: RequestOptions): Promise<TransportResponse>;
  delete(path: string, options?: RequestOptions): Promise<TransportResponse>;
  /** POST multipart/form-data */
  upload(path: string, file: UploadFile, options?: RequestOptions): Promise<TransportResponse>;
  /** Se o envio de arquivos retorno deve usar multipart */
  readonly uploadMode: boolean;
}
