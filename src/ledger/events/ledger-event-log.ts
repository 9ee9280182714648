import { Injectable } from '@nestjs/common';
import {
  LedgerEvent,
  RecordedLedgerEvent,
} from '../entities/ledger-event.entity';

/**
 * Ledger Event Sink
 *
 * LedgerService가 커밋 직후 호출하는 알림 수신자
 * - 추가만 가능 (append-only)
 * - 호출 순서 = 커밋 순서
 */
export abstract class LedgerEventSink {
  abstract emit(event: LedgerEvent): RecordedLedgerEvent;
}

/**
 * In-Memory Event Log
 *
 * - sequence 번호를 붙여서 순서대로 보관
 * - limit을 넘으면 가장 오래된 이벤트부터 버림 (sequence는 계속 증가)
 */
@Injectable()
export class LedgerEventLog extends LedgerEventSink {
  private readonly events: RecordedLedgerEvent[] = [];
  private nextSequence = 1;

  constructor(private readonly limit: number) {
    super();
  }

  emit(event: LedgerEvent): RecordedLedgerEvent {
    const recorded: RecordedLedgerEvent = {
      ...event,
      sequence: this.nextSequence++,
      timestamp: Date.now(),
    };

    this.events.push(recorded);
    if (this.events.length > this.limit) {
      this.events.shift();
    }

    return recorded;
  }

  /**
   * 이벤트 조회
   *
   * @param fromSequence - 이 번호 이상인 이벤트만 (기본값: 전부)
   * @param limit - 최대 개수
   */
  list(fromSequence = 0, limit = 100): RecordedLedgerEvent[] {
    return this.events
      .filter((event) => event.sequence >= fromSequence)
      .slice(0, limit);
  }

  /**
   * 마지막으로 기록된 sequence (없으면 0)
   */
  lastSequence(): number {
    return this.nextSequence - 1;
  }
}
