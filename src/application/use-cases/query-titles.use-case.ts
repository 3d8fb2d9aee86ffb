import crypto from 'crypto';
import { PlugBoletoPort, QueryParam } from '../ports/driven/plugboleto-port.js';
import { Logger } from '../ports/driven/logger-port.js';
import { TitleRecord, titleListSchema } from '../schemas/plugboleto-envelope.schema.js';
import { assertSuccess, readData, readEnvelope } from '../helpers/envelope-helpers.js';

export const DEFAULT_PAGE_LIMIT = 200;

/**
 * Garante um único `limit`: mantém o informado ou aplica o padrão.
 */
export function withDefaultLimit(params: QueryParam[], limit: number = DEFAULT_PAGE_LIMIT): QueryParam[] {
  return params.some((param) => param.name === 'limit') ? params : [...params, { name: 'limit', value: limit }];
}

/**
 * Substitui qualquer `limit` informado pelo limite fixo do endpoint.
 */
export function withFixedLimit(params: QueryParam[], limit: number = DEFAULT_PAGE_LIMIT): QueryParam[] {
  return [...params.filter((param) => param.name !== 'limit'), { name: 'limit', value: limit }];
}

/**
 * Use Case: Consultar boletos do cedente (GET /boletos)
 */
export class QueryTitlesUseCase {
  constructor(
    private plugboleto: PlugBoletoPort,
    private logger: Logger
  ) {}

  async execute(params: QueryParam[] = [], requestId: string = crypto.randomUUID()): Promise<TitleRecord[]> {
    const response = await this.plugboleto.get('boletos', {
      params: withDefaultLimit(params),
      headers: { 'X-Request-ID': requestId },
    });

    const envelope = assertSuccess(readEnvelope(response), undefined, response.httpCode);
    const records = readData(envelope, titleListSchema, response.httpCode);

    this.logger.debug({ requestId, count: records.length }, 'Boletos consultados na PlugBoleto');

    return records;
  }
}
