import { Scheduler } from '../ports/driven/scheduler-port.js';

export interface PollOptions<T> {
  query: () => Promise<T>;
  isDone: (result: T) => boolean;
  intervalMs: number;
  maxAttempts: number;
  scheduler: Scheduler;
  /** Espera antes da primeira consulta (padrão: 0, sem espera) */
  initialDelayMs?: number;
  /** Chamado após cada consulta que ainda não terminou */
  onPending?: (result: T, attempt: number) => void;
}

export interface PollResult<T> {
  result: T;
  attempts: number;
  /** false quando as tentativas acabaram sem `isDone` */
  ready: boolean;
}

/**
 * Consulta até `isDone` ou até esgotar `maxAttempts`.
 *
 * Esgotar as tentativas não é erro: devolve o último resultado com
 * `ready: false` e quem chama decide. Erros de `query` propagam sem retry.
 */
export async function pollUntilReady<T>(options: PollOptions<T>): Promise<PollResult<T>> {
  const { query, isDone, intervalMs, scheduler, initialDelayMs = 0, onPending } = options;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  if (initialDelayMs > 0) {
    await scheduler.sleep(initialDelayMs);
  }

  let attempts = 1;
  let result = await query();

  while (!isDone(result)) {
    onPending?.(result, attempts);
    if (attempts >= maxAttempts) {
      return { result, attempts, ready: false };
    }
    await scheduler.sleep(intervalMs);
    result = await query();
    attempts++;
  }

  return { result, attempts, ready: true };
}
