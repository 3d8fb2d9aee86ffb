#!/usr/bin/env node
/**
 * Script de Validação de Configuração
 *
 * Valida se todas as variáveis de ambiente obrigatórias estão configuradas
 * e se os valores são válidos.
 *
 * Uso: npm run validate-config
 */

import { Config, loadConfig, resolveBaseUrl, PLUGBOLETO_PRODUCTION_URL } from '../src/infrastructure/config/config.js';
import { maskDocument } from '../src/domain/helpers/log-sanitizer.js';

interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function validateConfig(): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
  };

  try {
    const config = loadConfig();

    console.log('✅ Configuração carregada com sucesso!\n');

    validatePlugBoletoConfig(config, result);
  } catch (error) {
    result.valid = false;
    result.errors.push(error instanceof Error ? error.message : 'Erro desconhecido ao validar configuração');
  }

  return result;
}

function validatePlugBoletoConfig(config: Config, result: ValidationResult): void {
  console.log('🔍 Validando configuração da PlugBoleto...');

  const baseUrl = resolveBaseUrl(config);
  console.log(`  Ambiente: ${baseUrl}`);
  console.log(`  CNPJ software house: ${maskDocument(config.plugboletoCnpjSh)}`);
  console.log(`  CNPJ cedente: ${maskDocument(config.plugboletoCnpjCedente)}`);

  for (const [name, value] of [
    ['PLUGBOLETO_CNPJ_SH', config.plugboletoCnpjSh],
    ['PLUGBOLETO_CNPJ_CEDENTE', config.plugboletoCnpjCedente],
  ] as const) {
    const digits = value.replace(/\D/g, '');
    if (digits.length !== 14 && digits.length !== 11) {
      result.warnings.push(`⚠️  ${name} não parece um CNPJ/CPF válido (${digits.length} dígitos)`);
    }
  }

  if (config.nodeEnv === 'production' && baseUrl !== PLUGBOLETO_PRODUCTION_URL) {
    result.warnings.push('⚠️  NODE_ENV=production, mas a PlugBoleto está apontando para homologação');
  }

  if (config.plugboletoDebug && config.nodeEnv === 'production') {
    result.warnings.push('⚠️  PLUGBOLETO_DEBUG ativo em produção');
  }
}

function main(): void {
  console.log('🚀 Validando configuração do conector PlugBoleto...\n');

  const result = validateConfig();

  if (result.warnings.length > 0) {
    console.log('\n📋 Avisos:');
    result.warnings.forEach((warning) => console.log(`  ${warning}`));
  }

  if (result.errors.length > 0) {
    console.log('\n❌ Erros encontrados:');
    result.errors.forEach((error) => console.log(`  - ${error}`));
    console.log('\n💡 Corrija os erros acima e tente novamente.\n');
    process.exit(1);
  }

  console.log('\n✅ Todas as validações passaram!');
  process.exit(0);
}

main();
