import { IssueTitlesUseCase } from '../use-cases/issue-titles.use-case.js';
import { ProcessReturnFileUseCase } from '../use-cases/process-return-file.use-case.js';
import { PrintTitlesUseCase } from '../use-cases/print-titles.use-case.js';
import { QueryTitlesUseCase } from '../use-cases/query-titles.use-case.js';
import { DiscardTitlesUseCase } from '../use-cases/discard-titles.use-case.js';
import { WriteOffTitlesUseCase } from '../use-cases/write-off-titles.use-case.js';
import { GenerateRemittanceUseCase } from '../use-cases/generate-remittance.use-case.js';
import { PlugBoletoRegistryService } from './plugboleto-registry.service.js';
import { IssuanceResult, TitleIssueRequest } from '../dtos/issuance-result.dto.js';
import { ReturnProcessingResult } from '../dtos/return-processing-result.dto.js';
import { PrintMode, PrintTarget } from '../dtos/print-request.dto.js';
import { CommandResult, RemittanceResult } from '../dtos/remittance-result.dto.js';
import { TitleRecord } from '../schemas/plugboleto-envelope.schema.js';
import { QueryParam } from '../ports/driven/plugboleto-port.js';
import { translate } from '../../domain/rules/bank-rule-table.js';
import { Occurrence, Title } from '../../domain/entities/title.js';
import { NormalizedAction } from '../../domain/entities/normalized-action.js';

/**
 * BoletoService / Facade
 * Ponto único de entrada para os fluxos de boleto da PlugBoleto
 */
export class BoletoService {
  constructor(
    private issueTitlesUseCase: IssueTitlesUseCase,
    private processReturnFileUseCase: ProcessReturnFileUseCase,
    private printTitlesUseCase: PrintTitlesUseCase,
    private queryTitlesUseCase: QueryTitlesUseCase,
    private discardTitlesUseCase: DiscardTitlesUseCase,
    private writeOffTitlesUseCase: WriteOffTitlesUseCase,
    private generateRemittanceUseCase: GenerateRemittanceUseCase,
    readonly registry: PlugBoletoRegistryService
  ) {}

  /**
   * Emite boletos em lote e reclassifica os aceitos pela situação consultada.
   */
  async issueTitles(titles: TitleIssueRequest[], requestId?: string): Promise<IssuanceResult> {
    return await this.issueTitlesUseCase.execute(titles, requestId);
  }

  /**
   * Envia o arquivo retorno, aguarda o processamento e traduz as ocorrências.
   */
  async processReturnFile(
    fileContent: string,
    layoutVersion: string | number,
    requestId?: string
  ): Promise<ReturnProcessingResult> {
    return await this.processReturnFileUseCase.execute(fileContent, layoutVersion, requestId);
  }

  /**
   * Solicita a impressão em lote e devolve o PDF.
   */
  async printTitles(target: PrintTarget, mode?: PrintMode, requestId?: string): Promise<Buffer> {
    return await this.printTitlesUseCase.execute(target, mode, requestId);
  }

  translate(bankId: string, layoutVersion: string | number, occurrence: Occurrence, title: Title): NormalizedAction {
    return translate(bankId, layoutVersion, occurrence, title);
  }

  async queryTitles(params?: QueryParam[], requestId?: string): Promise<TitleRecord[]> {
    return await this.queryTitlesUseCase.execute(params, requestId);
  }

  async discardTitles(ids: string[], requestId?: string): Promise<CommandResult> {
    return await this.discardTitlesUseCase.execute(ids, requestId);
  }

  async writeOffTitles(ids: string[], requestId?: string): Promise<CommandResult> {
    return await this.writeOffTitlesUseCase.execute(ids, requestId);
  }

  async generateRemittance(ids: string[], requestId?: string): Promise<RemittanceResult> {
    return await this.generateRemittanceUseCase.execute(ids, requestId);
  }
}
