export interface RemittanceFailure {
  idintegracao?: string;
  error: string;
}

export interface RemittanceResult {
  status: boolean;
  /** Dados da remessa gerada, com `titulos` reduzido aos ids */
  success: (Record<string, unknown> & { titulos: string[] }) | null;
  errors: RemittanceFailure[];
}

export interface CommandResult {
  message: string;
  data: unknown;
}
