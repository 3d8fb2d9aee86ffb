import { ProcessedAction } from '../../domain/entities/normalized-action.js';

export interface UnreconciledTitle {
  /** Nosso número original informado no arquivo */
  number: string;
  documentNumber: string;
  /** Ocorrências exatamente como retornadas pelo serviço */
  occurrences: unknown;
}

export interface ReturnProcessingResult {
  protocol: string;
  /** Tentativas esgotadas com o protocolo ainda em PROCESSANDO */
  timedOut: boolean;
  /** Ações por id de integração, na ordem das ocorrências */
  titles: Map<string, ProcessedAction[]>;
  /** Títulos do arquivo sem correspondência no cadastro */
  unreconciled: UnreconciledTitle[];
  /** Ids referenciados pelo retorno que a consulta de títulos não devolveu */
  unresolved: string[];
}
