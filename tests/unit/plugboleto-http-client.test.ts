import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock do axios ANTES de importar o adapter
vi.mock('axios', async () => {
  const actual = await vi.importActual<typeof import('axios')>('axios');
  return {
    ...actual,
    default: {
      ...actual.default,
      create: vi.fn(),
    },
  };
});

import axios, { AxiosError, AxiosInstance } from 'axios';
import FormData from 'form-data';
import { PlugBoletoHttpClient, buildQueryString } from '../../src/adapters/plugboleto/plugboleto-http-client.js';
import {
  Config,
  PLUGBOLETO_PRODUCTION_URL,
  PLUGBOLETO_SANDBOX_URL,
} from '../../src/infrastructure/config/config.js';
import { PlugBoletoError } from '../../src/domain/errors/plugboleto-error.js';
import { PlugBoletoErrorCode } from '../../src/domain/enums/plugboleto-error-code.js';
import { createMockLogger } from '../helpers/plugboleto-fakes.js';

const mockedAxios = vi.mocked(axios, true);
const request = vi.fn();
const mockAxiosInstance = { request } as unknown as AxiosInstance;

function makeConfig(overrides: Partial<Config> = {}): Config {
  return {
    nodeEnv: 'test',
    plugboletoCnpjSh: '01001001000113',
    plugboletoTokenSh: 'test-token',
    plugboletoCnpjCedente: '02002002000226',
    plugboletoProduction: false,
    plugboletoBaseUrl: undefined,
    plugboletoTimeoutMs: 30000,
    plugboletoUpload: false,
    plugboletoDebug: false,
    logLevel: 'info',
    serviceName: 'plugboleto-connector',
    ...overrides,
  };
}

const envelope = { _status: 'sucesso', _mensagem: 'ok', _dados: [] };

describe('PlugBoletoHttpClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockedAxios.create.mockReturnValue(mockAxiosInstance);
  });

  describe('configuração', () => {
    it('deve usar homologação e os headers de autenticação por padrão', () => {
      new PlugBoletoHttpClient(makeConfig(), createMockLogger());

      expect(mockedAxios.create).toHaveBeenCalledWith(
        expect.objectContaining({
          baseURL: PLUGBOLETO_SANDBOX_URL,
          timeout: 30000,
          headers: {
            'cnpj-sh': '01001001000113',
            'token-sh': 'test-token',
            'cnpj-cedente': '02002002000226',
            'Content-Type': 'application/json; charset=utf-8',
          },
        })
      );
    });

    it('deve usar produção quando configurado', () => {
      new PlugBoletoHttpClient(makeConfig({ plugboletoProduction: true }), createMockLogger());

      expect(mockedAxios.create).toHaveBeenCalledWith(expect.objectContaining({ baseURL: PLUGBOLETO_PRODUCTION_URL }));
    });

    it('deve priorizar a URL base informada', () => {
      new PlugBoletoHttpClient(
        makeConfig({ plugboletoProduction: true, plugboletoBaseUrl: 'http://localhost:9999/api/v1' }),
        createMockLogger()
      );

      expect(mockedAxios.create).toHaveBeenCalledWith(
        expect.objectContaining({ baseURL: 'http://localhost:9999/api/v1' })
      );
    });

    it('deve expor o modo upload', () => {
      expect(new PlugBoletoHttpClient(makeConfig({ plugboletoUpload: true }), createMockLogger()).uploadMode).toBe(true);
    });
  });

  describe('buildQueryString', () => {
    it('deve repetir parâmetros com o mesmo nome e ignorar vazios', () => {
      expect(
        buildQueryString([
          { name: 'limit', value: 2 },
          { name: 'idintegracao', value: '1' },
          { name: 'idintegracao', value: '2' },
          { name: 'situacao', value: '' },
          { name: 'cedente', value: null },
        ])
      ).toBe('limit=2&idintegracao=1&idintegracao=2');
    });
  });

  describe('requisições', () => {
    it('deve montar a URL com parâmetros e devolver o corpo decodificado', async () => {
      request.mockResolvedValueOnce({ data: envelope, status: 200, headers: {} });
      const client = new PlugBoletoHttpClient(makeConfig(), createMockLogger());

      const response = await client.get('boletos', {
        params: [
          { name: 'limit', value: 1 },
          { name: 'idintegracao', value: '1' },
        ],
        headers: { 'X-Request-ID': 'req-1' },
      });

      expect(response).toEqual({ body: envelope, httpCode: 200 });
      expect(request).toHaveBeenCalledWith({
        method: 'GET',
        url: '/boletos?limit=1&idintegracao=1',
        headers: { 'X-Request-ID': 'req-1' },
        data: undefined,
        responseType: 'json',
      });
    });

    it('deve gerar X-Request-ID quando não informado', async () => {
      request.mockResolvedValueOnce({ data: envelope, status: 200, headers: {} });
      const client = new PlugBoletoHttpClient(makeConfig(), createMockLogger());

      await client.post('/boletos/lote', [{ TituloValor: '1,00' }]);

      expect(request).toHaveBeenCalledWith(
        expect.objectContaining({
          method: 'POST',
          url: '/boletos/lote',
          data: [{ TituloValor: '1,00' }],
          headers: { 'X-Request-ID': expect.any(String) },
        })
      );
    });

    it('deve devolver envelope de erro com HTTP 4xx sem lançar', async () => {
      const errorEnvelope = { _status: 'erro', _mensagem: 'Falha', _dados: [] };
      request.mockResolvedValueOnce({ data: errorEnvelope, status: 400, headers: {} });
      const client = new PlugBoletoHttpClient(makeConfig(), createMockLogger());

      await expect(client.delete('cedentes/contas/1')).resolves.toEqual({ body: errorEnvelope, httpCode: 400 });
    });

    it('deve lançar falha de transporte para erro HTTP sem envelope', async () => {
      request.mockResolvedValueOnce({ data: '<html>Bad Gateway</html>', status: 502, headers: {} });
      const client = new PlugBoletoHttpClient(makeConfig(), createMockLogger());

      await expect(client.get('boletos')).rejects.toMatchObject({
        code: PlugBoletoErrorCode.TRANSPORT_FAILURE,
        statusCode: 502,
        message: 'Resposta inesperada da PlugBoleto (HTTP 502)\n',
      });
    });

    it('deve devolver Buffer quando decode é false e HTTP 200', async () => {
      request.mockResolvedValueOnce({ data: Buffer.from('%PDF-1.4'), status: 200, headers: {} });
      const client = new PlugBoletoHttpClient(makeConfig(), createMockLogger());

      const response = await client.get('boletos/impressao/lote/IMP1', { decode: false });

      expect(Buffer.isBuffer(response.body)).toBe(true);
      expect(String(response.body)).toBe('%PDF-1.4');
      expect(request).toHaveBeenCalledWith(expect.objectContaining({ responseType: 'arraybuffer' }));
    });

    it('deve decodificar JSON quando decode é false e HTTP diferente de 200', async () => {
      const errorEnvelope = { _status: 'erro', _mensagem: 'Protocolo não encontrado', _dados: [] };
      request.mockResolvedValueOnce({ data: Buffer.from(JSON.stringify(errorEnvelope)), status: 404, headers: {} });
      const client = new PlugBoletoHttpClient(makeConfig(), createMockLogger());

      const response = await client.get('boletos/impressao/lote/IMP1', { decode: false });

      expect(response).toEqual({ body: errorEnvelope, httpCode: 404 });
    });

    it('deve anexar diagnósticos quando o modo debug está ativo', async () => {
      request.mockResolvedValueOnce({ data: envelope, status: 200, headers: { 'content-type': 'application/json' } });
      const client = new PlugBoletoHttpClient(makeConfig({ plugboletoDebug: true }), createMockLogger());

      const response = await client.get('boletos', { headers: { 'X-Request-ID': 'req-1' } });

      expect(response.diagnostics).toEqual({
        method: 'GET',
        url: '/boletos',
        durationMs: expect.any(Number),
        requestId: 'req-1',
        responseHeaders: { 'content-type': 'application/json' },
      });
    });

    it('deve converter erro de rede em PlugBoletoError', async () => {
      request.mockRejectedValueOnce(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'));
      const logger = createMockLogger();
      const client = new PlugBoletoHttpClient(makeConfig(), logger);

      const error = await client.get('boletos').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PlugBoletoError);
      if (error instanceof PlugBoletoError) {
        expect(error.code).toBe(PlugBoletoErrorCode.TRANSPORT_FAILURE);
        expect(error.statusCode).toBeUndefined();
        expect(error.message).toBe('Falha de comunicação com a PlugBoleto: timeout of 30000ms exceeded\n');
      }
      expect(logger.error).toHaveBeenCalled();
    });
  });

  describe('upload', () => {
    it('deve enviar o arquivo como multipart/form-data', async () => {
      request.mockResolvedValueOnce({ data: { _status: 'sucesso', _mensagem: '', _dados: { protocolo: 'P1' } }, status: 200, headers: {} });
      const client = new PlugBoletoHttpClient(makeConfig({ plugboletoUpload: true }), createMockLogger());

      await client.upload(
        'retornos',
        { field: 'arquivo', filename: 'retorno.ret', content: 'conteudo', contentType: 'text/plain' },
        { headers: { 'X-Request-ID': 'req-1' } }
      );

      const [call] = request.mock.calls;
      const config = call[0];
      expect(config.method).toBe('POST');
      expect(config.url).toBe('/retornos');
      expect(config.data).toBeInstanceOf(FormData);
      expect(config.headers['X-Request-ID']).toBe('req-1');
      expect(config.headers['content-type']).toMatch(/^multipart\/form-data; boundary=/);
    });
  });
});
