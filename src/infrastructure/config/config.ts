import { z } from 'zod';

// z.coerce.boolean() trata "false" como true
const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', ''])])
  .optional()
  .transform((value) => value === true || value === 'true' || value === '1');

export const PLUGBOLETO_PRODUCTION_URL = 'https://plugboleto.com.br/api/v1';
export const PLUGBOLETO_SANDBOX_URL = 'https://homologacao.plugboleto.com.br/api/v1';

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // PlugBoleto
  plugboletoCnpjSh: z.string().min(1),
  plugboletoTokenSh: z.string().min(1),
  plugboletoCnpjCedente: z.string().min(1),
  plugboletoProduction: booleanFlag,
  plugboletoBaseUrl: z.string().url().optional(),
  plugboletoTimeoutMs: z.coerce.number().int().positive().default(30000),
  // Envia arquivos retorno como multipart/form-data
  plugboletoUpload: booleanFlag,
  // Anexa diagnósticos da requisição às respostas
  plugboletoDebug: booleanFlag,

  // Observability
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  serviceName: z.string().default('plugboleto-connector'),
});

export type Config = z.infer<typeof configSchema>;

export function resolveBaseUrl(config: Pick<Config, 'plugboletoBaseUrl' | 'plugboletoProduction'>): string {
  if (config.plugboletoBaseUrl) {
    return config.plugboletoBaseUrl;
  }
  return config.plugboletoProduction ? PLUGBOLETO_PRODUCTION_URL : PLUGBOLETO_SANDBOX_URL;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    const config = {
      nodeEnv: env.NODE_ENV,
      plugboletoCnpjSh: env.PLUGBOLETO_CNPJ_SH,
      plugboletoTokenSh: env.PLUGBOLETO_TOKEN_SH,
      plugboletoCnpjCedente: env.PLUGBOLETO_CNPJ_CEDENTE,
      plugboletoProduction: env.PLUGBOLETO_PRODUCTION,
      plugboletoBaseUrl: env.PLUGBOLETO_BASE_URL || undefined,
      plugboletoTimeoutMs: env.PLUGBOLETO_TIMEOUT_MS,
      plugboletoUpload: env.PLUGBOLETO_UPLOAD,
      plugboletoDebug: env.PLUGBOLETO_DEBUG,
      logLevel: env.LOG_LEVEL,
      serviceName: env.SERVICE_NAME,
    };

    return configSchema.parse(config);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missingVars = error.errors.map((e) => e.path.map(String).join('.')).join(', ');
      throw new Error(`Configuração inválida. Variáveis faltando ou inválidas: ${missingVars}`);
    }
    throw error;
  }
}
