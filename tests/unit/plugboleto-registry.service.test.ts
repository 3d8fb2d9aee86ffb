import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PlugBoletoRegistryService } from '../../src/application/services/plugboleto-registry.service.js';
import { PlugBoletoPort } from '../../src/application/ports/driven/plugboleto-port.js';
import { PlugBoletoErrorCode } from '../../src/domain/enums/plugboleto-error-code.js';
import { createMockLogger, createMockPlugBoleto, fail, ok } from '../helpers/plugboleto-fakes.js';

describe('PlugBoletoRegistryService', () => {
  let plugboleto: PlugBoletoPort;
  let service: PlugBoletoRegistryService;

  beforeEach(() => {
    plugboleto = createMockPlugBoleto();
    service = new PlugBoletoRegistryService(plugboleto, createMockLogger());
  });

  it('deve listar cedentes com limite fixo', async () => {
    vi.mocked(plugboleto.get).mockResolvedValueOnce(ok([{ id: 1 }], 'Consulta realizada'));

    const result = await service.listBeneficiaries([{ name: 'limit', value: 10 }]);

    expect(result).toEqual({ message: 'Consulta realizada', data: [{ id: 1 }] });
    expect(plugboleto.get).toHaveBeenCalledWith('cedentes', {
      params: [{ name: 'limit', value: 200 }],
      headers: { 'X-Request-ID': expect.any(String) },
    });
  });

  it('deve atualizar cedente enviando o CNPJ do cedente no header', async () => {
    vi.mocked(plugboleto.put).mockResolvedValueOnce(ok({ id: 5 }));
    const data = { CedenteCPFCNPJ: '01001001000113', CedenteRazaoSocial: 'Empresa Teste' };

    await service.updateBeneficiary(5, data);

    expect(plugboleto.put).toHaveBeenCalledWith('cedentes/5', data, {
      params: [],
      headers: { 'cnpj-cedente': '01001001000113', 'X-Request-ID': expect.any(String) },
    });
  });

  it('deve manter o cnpj-cedente configurado quando o cedente não informa documento', async () => {
    vi.mocked(plugboleto.put).mockResolvedValueOnce(ok({ id: 5 }));
    const data = { CedenteRazaoSocial: 'Empresa Teste' };

    await service.updateBeneficiary(5, data);

    expect(plugboleto.put).toHaveBeenCalledWith('cedentes/5', data, {
      params: [],
      headers: { 'X-Request-ID': expect.any(String) },
    });
  });

  it('deve criar conta com tipo corrente e validações desativadas', async () => {
    vi.mocked(plugboleto.post).mockResolvedValueOnce(ok({ id: 7 }));

    await service.createAccount({ ContaCodigoBanco: '341', ContaAgencia: '0001', ContaTipo: 'POUPANCA' });

    expect(plugboleto.post).toHaveBeenCalledWith(
      'cedentes/contas',
      {
        ContaCodigoBanco: '341',
        ContaAgencia: '0001',
        ContaTipo: 'CORRENTE',
        ContaValidacaoAtiva: false,
        ContaImpressaoAtualizada: false,
      },
      expect.objectContaining({ params: [] })
    );
  });

  it('deve excluir convênio pelo id', async () => {
    vi.mocked(plugboleto.delete).mockResolvedValueOnce(ok(null, 'Convênio excluído'));

    const result = await service.deleteAgreement(12);

    expect(result).toEqual({ message: 'Convênio excluído', data: null });
    expect(plugboleto.delete).toHaveBeenCalledWith('cedentes/contas/convenios/12', expect.objectContaining({ params: [] }));
  });

  it('deve lançar erro com os motivos quando o cadastro é recusado', async () => {
    vi.mocked(plugboleto.post).mockResolvedValueOnce(
      fail('Convênio inválido', [{ _erro: 'ConvenioNumero obrigatório' }, { _erro: 'ConvenioCarteira obrigatória' }])
    );

    await expect(service.createAgreement({ ConvenioDescricao: 'Teste' })).rejects.toMatchObject({
      code: PlugBoletoErrorCode.SUBMISSION_REJECTED,
      message: 'Convênio inválido\nConvenioNumero obrigatório\nConvenioCarteira obrigatória',
      statusCode: 400,
    });
  });
});
