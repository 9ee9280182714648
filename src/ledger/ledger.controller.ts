import { Body, Controller, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { formatUnits } from '../common/utils/units.util';
import {
  AdminRequestDto,
  BlacklistRequestDto,
  BlacklistStatusDto,
  BurnFromRequestDto,
  MintRequestDto,
  SupplyResponseDto,
} from './dto/admin.dto';
import {
  AllowanceChangeRequestDto,
  AllowanceResponseDto,
  ApproveRequestDto,
} from './dto/allowance.dto';
import {
  AddressParamDto,
  AllowanceParamDto,
  BalanceResponseDto,
  EventsQueryDto,
  LedgerInfoDto,
} from './dto/ledger.dto';
import {
  OperationResponseDto,
  TransferFromRequestDto,
  TransferRequestDto,
} from './dto/transfer.dto';
import { serializeEvent } from './entities/ledger-event.entity';
import { LedgerEventLog } from './events/ledger-event-log';
import { LedgerService } from './ledger.service';

/**
 * LedgerController
 *
 * 원장 HTTP API
 *
 * - 모든 변경 요청은 body의 caller를 호출자로 사용 (인증은 앞단에서 처리)
 * - 수량은 최소 단위의 10진수 문자열로 주고받음 (bigint 정밀도 유지)
 * - LedgerError는 LedgerExceptionFilter가 HTTP 상태로 변환
 */
@ApiTags('ledger')
@Controller('ledger')
export class LedgerController {
  constructor(
    private readonly ledgerService: LedgerService,
    private readonly eventLog: LedgerEventLog,
  ) {}

  /**
   * GET /ledger
   */
  @Get()
  @ApiOperation({
    summary: '원장 정보 조회',
    description: '이름, 심볼, 소수 자릿수, 총 공급량, 관리자, 일시 정지 여부',
  })
  @ApiResponse({ status: 200, type: LedgerInfoDto })
  async getInfo(): Promise<LedgerInfoDto> {
    const info = await this.ledgerService.getInfo();
    return {
      name: info.name,
      symbol: info.symbol,
      decimals: info.decimals,
      totalSupply: info.totalSupply.toString(),
      owner: info.admin,
      paused: info.paused,
    };
  }

  @Get('balance/:address')
  @ApiOperation({ summary: '잔액 조회' })
  @ApiParam({ name: 'address', description: '조회할 계정 주소' })
  @ApiResponse({ status: 200, type: BalanceResponseDto })
  async getBalance(
    @Param() params: AddressParamDto,
  ): Promise<BalanceResponseDto> {
    const balance = await this.ledgerService.balanceOf(params.address);
    const { decimals } = await this.ledgerService.metadata();
    return {
      address: params.address.toLowerCase(),
      balance: balance.toString(),
      formatted: formatUnits(balance, decimals),
    };
  }

  @Get('allowance/:owner/:spender')
  @ApiOperation({ summary: '허용량 조회' })
  @ApiResponse({ status: 200, type: AllowanceResponseDto })
  async getAllowance(
    @Param() params: AllowanceParamDto,
  ): Promise<AllowanceResponseDto> {
    const allowance = await this.ledgerService.allowanceOf(
      params.owner,
      params.spender,
    );
    return {
      owner: params.owner.toLowerCase(),
      spender: params.spender.toLowerCase(),
      allowance: allowance.toString(),
    };
  }

  @Get('blacklist/:address')
  @ApiOperation({ summary: '블랙리스트 여부 조회' })
  @ApiResponse({ status: 200, type: BlacklistStatusDto })
  async getBlacklistStatus(
    @Param() params: AddressParamDto,
  ): Promise<BlacklistStatusDto> {
    return {
      account: params.address.toLowerCase(),
      blacklisted: await this.ledgerService.isBlacklisted(params.address),
    };
  }

  /**
   * 이벤트 조회
   *
   * GET /ledger/events?from=1&limit=100
   */
  @Get('events')
  @ApiOperation({
    summary: '이벤트 조회',
    description: '커밋 순서대로 기록된 이벤트 (sequence 오름차순)',
  })
  getEvents(
    @Query() query: EventsQueryDto,
  ): Record<string, string | number | boolean>[] {
    const from = query.from === undefined ? 0 : Number(query.from);
    const limit = query.limit === undefined ? 100 : Number(query.limit);
    return this.eventLog.list(from, limit).map(serializeEvent);
  }

  // ─────────────────────────────────────────────
  // 사용자 작업
  // ─────────────────────────────────────────────

  @Post('transfer')
  @HttpCode(200)
  @ApiOperation({ summary: '송금', description: 'caller → to' })
  @ApiResponse({ status: 200, type: OperationResponseDto })
  async transfer(
    @Body() body: TransferRequestDto,
  ): Promise<OperationResponseDto> {
    const success = await this.ledgerService.transfer(
      body.caller,
      body.to,
      BigInt(body.amount),
    );
    return { success };
  }

  @Post('approve')
  @HttpCode(200)
  @ApiOperation({ summary: '허용량 설정 (덮어쓰기)' })
  @ApiResponse({ status: 200, type: OperationResponseDto })
  async approve(@Body() body: ApproveRequestDto): Promise<OperationResponseDto> {
    const success = await this.ledgerService.approve(
      body.caller,
      body.spender,
      BigInt(body.amount),
    );
    return { success };
  }

  @Post('increase-allowance')
  @HttpCode(200)
  @ApiOperation({ summary: '허용량 증가' })
  @ApiResponse({ status: 200, type: OperationResponseDto })
  async increaseAllowance(
    @Body() body: AllowanceChangeRequestDto,
  ): Promise<OperationResponseDto> {
    const success = await this.ledgerService.increaseAllowance(
      body.caller,
      body.spender,
      BigInt(body.delta),
    );
    return { success };
  }

  @Post('decrease-allowance')
  @HttpCode(200)
  @ApiOperation({ summary: '허용량 감소' })
  @ApiResponse({ status: 200, type: OperationResponseDto })
  async decreaseAllowance(
    @Body() body: AllowanceChangeRequestDto,
  ): Promise<OperationResponseDto> {
    const success = await this.ledgerService.decreaseAllowance(
      body.caller,
      body.spender,
      BigInt(body.delta),
    );
    return { success };
  }

  @Post('transfer-from')
  @HttpCode(200)
  @ApiOperation({
    summary: '위임 전송',
    description: 'caller(spender)가 from의 허용량을 사용해 to로 전송',
  })
  @ApiResponse({ status: 200, type: OperationResponseDto })
  async transferFrom(
    @Body() body: TransferFromRequestDto,
  ): Promise<OperationResponseDto> {
    const success = await this.ledgerService.transferFrom(
      body.caller,
      body.from,
      body.to,
      BigInt(body.amount),
    );
    return { success };
  }

  // ─────────────────────────────────────────────
  // 관리자 작업
  // ─────────────────────────────────────────────

  @Post('mint')
  @HttpCode(200)
  @ApiOperation({ summary: '발행 (관리자 전용)' })
  @ApiResponse({ status: 200, type: SupplyResponseDto })
  async mint(@Body() body: MintRequestDto): Promise<SupplyResponseDto> {
    const totalSupply = await this.ledgerService.mint(
      body.caller,
      body.to,
      BigInt(body.amount),
    );
    return { totalSupply: totalSupply.toString() };
  }

  @Post('burn-from')
  @HttpCode(200)
  @ApiOperation({ summary: '소각 (관리자 전용)' })
  @ApiResponse({ status: 200, type: SupplyResponseDto })
  async burnFrom(@Body() body: BurnFromRequestDto): Promise<SupplyResponseDto> {
    const totalSupply = await this.ledgerService.burnFrom(
      body.caller,
      body.from,
      BigInt(body.amount),
    );
    return { totalSupply: totalSupply.toString() };
  }

  @Post('pause')
  @HttpCode(200)
  @ApiOperation({ summary: '일시 정지 (관리자 전용)' })
  @ApiResponse({ status: 200, type: OperationResponseDto })
  async pause(@Body() body: AdminRequestDto): Promise<OperationResponseDto> {
    await this.ledgerService.pause(body.caller);
    return { success: true };
  }

  @Post('unpause')
  @HttpCode(200)
  @ApiOperation({ summary: '일시 정지 해제 (관리자 전용)' })
  @ApiResponse({ status: 200, type: OperationResponseDto })
  async unpause(@Body() body: AdminRequestDto): Promise<OperationResponseDto> {
    await this.ledgerService.unpause(body.caller);
    return { success: true };
  }

  @Post('blacklist')
  @HttpCode(200)
  @ApiOperation({ summary: '블랙리스트 추가 (관리자 전용)' })
  @ApiResponse({ status: 200, type: OperationResponseDto })
  async blacklist(
    @Body() body: BlacklistRequestDto,
  ): Promise<OperationResponseDto> {
    await this.ledgerService.blacklist(body.caller, body.account);
    return { success: true };
  }

  @Post('unblacklist')
  @HttpCode(200)
  @ApiOperation({ summary: '블랙리스트 해제 (관리자 전용)' })
  @ApiResponse({ status: 200, type: OperationResponseDto })
  async unblacklist(
    @Body() body: BlacklistRequestDto,
  ): Promise<OperationResponseDto> {
    await this.ledgerService.unblacklist(body.caller, body.account);
    return { success: true };
  }
}
