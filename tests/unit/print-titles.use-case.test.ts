import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PrintTitlesUseCase, looksLikeEnvelope } from '../../src/application/use-cases/print-titles.use-case.js';
import { PlugBoletoPort, TransportResponse } from '../../src/application/ports/driven/plugboleto-port.js';
import { Logger } from '../../src/application/ports/driven/logger-port.js';
import { PlugBoletoErrorCode } from '../../src/domain/enums/plugboleto-error-code.js';
import { FakeScheduler, createMockLogger, createMockPlugBoleto, fail, ok } from '../helpers/plugboleto-fakes.js';

const PDF = Buffer.from('%PDF-1.4 conteúdo de teste');

function pending(mensagem: string, situacoes: string[]): TransportResponse {
  const body = { _status: 'sucesso', _mensagem: mensagem, _dados: situacoes.map((situacao) => ({ situacao })) };
  return { body: Buffer.from(JSON.stringify(body)), httpCode: 200 };
}

describe('PrintTitlesUseCase', () => {
  let useCase: PrintTitlesUseCase;
  let plugboleto: PlugBoletoPort;
  let scheduler: FakeScheduler;
  let logger: Logger;

  beforeEach(() => {
    plugboleto = createMockPlugBoleto();
    scheduler = new FakeScheduler();
    logger = createMockLogger();
    useCase = new PrintTitlesUseCase(plugboleto, scheduler, logger);
  });

  it('deve devolver o PDF quando ficar pronto', async () => {
    vi.mocked(plugboleto.post).mockResolvedValueOnce(ok({ protocolo: 'IMP1' }));
    vi.mocked(plugboleto.get)
      .mockResolvedValueOnce(pending('Processando', ['PROCESSANDO']))
      .mockResolvedValueOnce({ body: PDF, httpCode: 200 });

    const pdf = await useCase.execute(['1', '2'], '0', 'req-1');

    expect(pdf.equals(PDF)).toBe(true);
    expect(plugboleto.post).toHaveBeenCalledWith(
      'boletos/impressao/lote',
      { Boletos: ['1', '2'], TipoImpressao: '0' },
      { params: [{ name: 'limit', value: 200 }], headers: { 'X-Request-ID': 'req-1' } }
    );
    expect(plugboleto.get).toHaveBeenCalledWith('boletos/impressao/lote/IMP1', {
      decode: false,
      headers: { 'X-Request-ID': 'req-1' },
    });
    expect(scheduler.sleeps).toEqual([1000, 1000]);
  });

  it('deve enviar personalização como tipo 99', async () => {
    vi.mocked(plugboleto.post).mockResolvedValueOnce(ok({ protocolo: 'IMP2' }));
    vi.mocked(plugboleto.get).mockResolvedValueOnce({ body: PDF, httpCode: 200 });

    await useCase.execute({ TituloNossoNumero: '0001', Layout: 'carne' }, '0', 'req-1');

    expect(plugboleto.post).toHaveBeenCalledWith(
      'boletos/impressao/lote',
      { Personalizacao: { TituloNossoNumero: '0001', Layout: 'carne' }, TipoImpressao: '99' },
      { params: [{ name: 'limit', value: 200 }], headers: { 'X-Request-ID': 'req-1' } }
    );
  });

  it('deve lançar erro com a última mensagem após 10 tentativas', async () => {
    vi.mocked(plugboleto.post).mockResolvedValueOnce(ok({ protocolo: 'IMP1' }));
    vi.mocked(plugboleto.get).mockResolvedValue(pending('Impressão em processamento', ['Aguardando', 'Em fila']));

    await expect(useCase.execute(['1'], '0', 'req-1')).rejects.toMatchObject({
      code: PlugBoletoErrorCode.PRINT_NOT_READY,
      message: 'Impressão em processamento\nAguardando\nEm fila',
    });
    expect(plugboleto.get).toHaveBeenCalledTimes(10);
    expect(scheduler.sleeps).toHaveLength(10);
  });

  it('deve continuar consultando quando a consulta retorna envelope de erro decodificado', async () => {
    vi.mocked(plugboleto.post).mockResolvedValueOnce(ok({ protocolo: 'IMP1' }));
    vi.mocked(plugboleto.get)
      .mockResolvedValueOnce(fail('Protocolo ainda não disponível', [], 404))
      .mockResolvedValueOnce({ body: PDF, httpCode: 200 });

    const pdf = await useCase.execute(['1'], '0', 'req-1');

    expect(pdf.equals(PDF)).toBe(true);
    expect(plugboleto.get).toHaveBeenCalledTimes(2);
  });

  it('deve lançar erro de envio quando a solicitação é recusada', async () => {
    vi.mocked(plugboleto.post).mockResolvedValueOnce(fail('Boletos não encontrados', [{ _erro: 'idintegracao 1' }]));

    await expect(useCase.execute(['1'], '0', 'req-1')).rejects.toMatchObject({
      code: PlugBoletoErrorCode.SUBMISSION_REJECTED,
      message: 'Boletos não encontrados\nidintegracao 1',
    });
    expect(plugboleto.get).not.toHaveBeenCalled();
  });

  it('deve exigir ao menos um boleto', async () => {
    await expect(useCase.execute([], '0', 'req-1')).rejects.toMatchObject({
      code: PlugBoletoErrorCode.VALIDATION_FAILED,
    });
    await expect(useCase.execute({}, '0', 'req-1')).rejects.toMatchObject({
      code: PlugBoletoErrorCode.VALIDATION_FAILED,
    });
    expect(plugboleto.post).not.toHaveBeenCalled();
  });

  it('deve recusar impressão personalizada para lista de boletos', async () => {
    await expect(useCase.execute(['1', '2'], '99', 'req-1')).rejects.toMatchObject({
      code: PlugBoletoErrorCode.VALIDATION_FAILED,
      message: 'Impressão personalizada (tipo 99) exige o layout de personalização, não uma lista de boletos\n',
    });
    expect(plugboleto.post).not.toHaveBeenCalled();
  });

  describe('looksLikeEnvelope', () => {
    it('deve reconhecer envelope em Buffer ou objeto', () => {
      expect(looksLikeEnvelope(Buffer.from('{"_status":"erro","_mensagem":"x"}'))).toBe(true);
      expect(looksLikeEnvelope({ _status: 'sucesso' })).toBe(true);
    });

    it('deve tratar conteúdo binário ou JSON inválido como artefato', () => {
      expect(looksLikeEnvelope(PDF)).toBe(false);
      expect(looksLikeEnvelope(Buffer.from('{não é json'))).toBe(false);
      expect(looksLikeEnvelope(Buffer.from('{"outro":1}'))).toBe(false);
    });
  });
});
