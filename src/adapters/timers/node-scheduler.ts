import { setTimeout as delay } from 'timers/promises';
import { Scheduler } from '../../application/ports/driven/scheduler-port.js';

export class NodeScheduler implements Scheduler {
  async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    await delay(ms);
  }
}
