import { Injectable } from '@nestjs/common';

/**
 * Wall clock that never repeats or goes backwards within the process, so
 * history timestamps order entries by the commit order of their operations.
 */
@Injectable()
export class LedgerClock {
  private last = 0;

  now(): Date {
    const millis = Math.max(Date.now(), this.last + 1);
    this.last = millis;
    return new Date(millis);
  }
}
