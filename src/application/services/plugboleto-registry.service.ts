import crypto from 'crypto';
import { PlugBoletoPort, QueryParam, RequestOptions, TransportResponse } from '../ports/driven/plugboleto-port.js';
import { Logger } from '../ports/driven/logger-port.js';
import { CommandResult } from '../dtos/remittance-result.dto.js';
import { assertSuccess, readEnvelope } from '../helpers/envelope-helpers.js';
import { withFixedLimit } from '../use-cases/query-titles.use-case.js';

export type RegistryPayload = Record<string, unknown>;

const ACCOUNT_DEFAULTS = {
  ContaTipo: 'CORRENTE',
  ContaValidacaoAtiva: false,
  ContaImpressaoAtualizada: false,
} as const;

/**
 * Cadastros da PlugBoleto: cedentes, contas e convênios.
 *
 * Operações simples de requisição/resposta; erros do serviço viram
 * PlugBoletoError com a mensagem e os motivos por item.
 */
export class PlugBoletoRegistryService {
  constructor(
    private plugboleto: PlugBoletoPort,
    private logger: Logger
  ) {}

  listBeneficiaries(params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('GET', 'cedentes', { params: withFixedLimit(params) });
  }

  createBeneficiary(data: RegistryPayload, params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('POST', 'cedentes', { params }, data);
  }

  /**
   * Atualiza o cedente; o CNPJ do próprio cedente vai no header `cnpj-cedente`.
   */
  updateBeneficiary(id: string | number, data: RegistryPayload, params: QueryParam[] = []): Promise<CommandResult> {
    const cnpj = typeof data.CedenteCPFCNPJ === 'string' ? data.CedenteCPFCNPJ.trim() : '';
    const headers: Record<string, string> = cnpj ? { 'cnpj-cedente': cnpj } : {};
    return this.run('PUT', `cedentes/${id}`, { params, headers }, data);
  }

  listAccounts(params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('GET', 'cedentes/contas', { params: withFixedLimit(params) });
  }

  createAccount(data: RegistryPayload, params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('POST', 'cedentes/contas', { params }, { ...data, ...ACCOUNT_DEFAULTS });
  }

  updateAccount(id: number, data: RegistryPayload, params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('PUT', `cedentes/contas/${id}`, { params }, { ...data, ...ACCOUNT_DEFAULTS });
  }

  deleteAccount(id: number, params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('DELETE', `cedentes/contas/${id}`, { params });
  }

  listAgreements(params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('GET', 'cedentes/contas/convenios', { params: withFixedLimit(params) });
  }

  createAgreement(data: RegistryPayload, params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('POST', 'cedentes/contas/convenios', { params }, data);
  }

  updateAgreement(id: number, data: RegistryPayload, params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('PUT', `cedentes/contas/convenios/${id}`, { params }, data);
  }

  deleteAgreement(id: number, params: QueryParam[] = []): Promise<CommandResult> {
    return this.run('DELETE', `cedentes/contas/convenios/${id}`, { params });
  }

  private async run(
    method: 'GET' | 'POST' | 'PUT' | 'DELETE',
    path: string,
    options: RequestOptions,
    body?: RegistryPayload
  ): Promise<CommandResult> {
    const requestId = crypto.randomUUID();
    const withRequestId: RequestOptions = {
      ...options,
      headers: { ...options.headers, 'X-Request-ID': requestId },
    };

    const response = await this.send(method, path, withRequestId, body);
    const envelope = assertSuccess(readEnvelope(response), undefined, response.httpCode);

    this.logger.debug({ requestId, method, path, httpCode: response.httpCode }, 'Cadastro PlugBoleto executado');

    return { message: envelope._mensagem, data: envelope._dados };
  }

  private send(
    method: 'GET' | 'POST' | 'PUT' | 'DELETE',
    path: string,
    options: RequestOptions,
    body: RegistryPayload = {}
  ): Promise<TransportResponse> {
    switch (method) {
      case 'GET':
        return this.plugboleto.get(path, options);
      case 'DELETE':
        return this.plugboleto.delete(path, options);
      case 'PUT':
        return this.plugboleto.put(path, body, options);
      case 'POST':
        return this.plugboleto.post(path, body, options);
    }
  }
}
