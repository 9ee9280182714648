import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import {
  LedgerError,
  LedgerErrorKind,
} from '../../ledger/errors/ledger.errors';

/**
 * 에러 종류 → HTTP 상태
 *
 * - 400: 인자 자체가 잘못됨
 * - 403: 호출자/참여자 권한 문제
 * - 409: 현재 상태와 충돌 (잔액, 허용량, 일시 정지)
 * - 422: uint256 범위 초과
 */
export const LEDGER_ERROR_STATUS: Record<LedgerErrorKind, HttpStatus> = {
  ZeroAddress: HttpStatus.BAD_REQUEST,
  ZeroAmount: HttpStatus.BAD_REQUEST,
  Unauthorized: HttpStatus.FORBIDDEN,
  Blacklisted: HttpStatus.FORBIDDEN,
  Paused: HttpStatus.CONFLICT,
  InsufficientBalance: HttpStatus.CONFLICT,
  InsufficientApproval: HttpStatus.CONFLICT,
  AllowanceUnderflow: HttpStatus.CONFLICT,
  ArithmeticOverflow: HttpStatus.UNPROCESSABLE_ENTITY,
};

export interface LedgerErrorBody {
  statusCode: HttpStatus;
  error: LedgerErrorKind;
  message: string;
}

export function toErrorBody(exception: LedgerError): LedgerErrorBody {
  return {
    statusCode: LEDGER_ERROR_STATUS[exception.kind],
    error: exception.kind,
    message: exception.message,
  };
}

/**
 * LedgerExceptionFilter
 *
 * LedgerError만 처리하고 나머지는 Nest 기본 필터에 맡김
 */
@Catch(LedgerError)
export class LedgerExceptionFilter implements ExceptionFilter<LedgerError> {
  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: LedgerError, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const body = toErrorBody(exception);

    httpAdapter.reply(
      host.switchToHttp().getResponse(),
      body,
      body.statusCode,
    );
  }
}
