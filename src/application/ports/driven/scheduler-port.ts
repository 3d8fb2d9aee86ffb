/**
 * Port: Agendador
 *
 * Abstrai a espera entre consultas de status para que os testes simulem
 * dezenas de tentativas sem esperar de verdade.
 */
export interface Scheduler {
  sleep(ms: number): Promise<void>;
}
