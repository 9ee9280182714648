import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, Matches } from 'class-validator';
import {
  ADDRESS_MESSAGE,
  ADDRESS_PATTERN,
  EXAMPLE_ADDRESS,
} from './validation.patterns';

/**
 * 원장 정보 응답 DTO
 */
export class LedgerInfoDto {
  @ApiProperty({ example: 'Mini Dollar' })
  name!: string;

  @ApiProperty({ example: 'mUSD' })
  symbol!: string;

  @ApiProperty({ example: 6 })
  decimals!: number;

  @ApiProperty({ description: '총 공급량 (최소 단위)', example: '1000000' })
  totalSupply!: string;

  @ApiProperty({ description: '관리자 주소', example: EXAMPLE_ADDRESS })
  owner!: string;

  @ApiProperty({ example: false })
  paused!: boolean;
}

/**
 * 잔액 조회 응답 DTO
 */
export class BalanceResponseDto {
  @ApiProperty({ example: EXAMPLE_ADDRESS })
  address!: string;

  @ApiProperty({ description: '잔액 (최소 단위)', example: '100000' })
  balance!: string;

  @ApiProperty({ description: '잔액 (표시 단위)', example: '0.1' })
  formatted!: string;
}

/**
 * 주소 경로 파라미터
 */
export class AddressParamDto {
  @Matches(ADDRESS_PATTERN, { message: `address ${ADDRESS_MESSAGE}` })
  address!: string;
}

/**
 * 허용량 경로 파라미터
 */
export class AllowanceParamDto {
  @Matches(ADDRESS_PATTERN, { message: `owner ${ADDRESS_MESSAGE}` })
  owner!: string;

  @Matches(ADDRESS_PATTERN, { message: `spender ${ADDRESS_MESSAGE}` })
  spender!: string;
}

/**
 * 이벤트 조회 쿼리
 */
export class EventsQueryDto {
  @ApiPropertyOptional({ description: '이 sequence 이상만 조회', example: '1' })
  @IsOptional()
  @Matches(/^\d+$/, { message: 'from must be a non-negative integer' })
  from?: string;

  @ApiPropertyOptional({ description: '최대 개수 (기본 100)', example: '100' })
  @IsOptional()
  @Matches(/^[1-9]\d*$/, { message: 'limit must be a positive integer' })
  limit?: string;
}
