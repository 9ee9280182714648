import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, Matches } from 'class-validator';
import {
  ADDRESS_MESSAGE,
  ADDRESS_PATTERN,
  AMOUNT_MESSAGE,
  AMOUNT_PATTERN,
  EXAMPLE_ADDRESS,
} from './validation.patterns';

/**
 * 관리자 전용 작업 공통 DTO (pause / unpause)
 */
export class AdminRequestDto {
  @ApiProperty({ description: '호출자 (관리자여야 함)', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `caller ${ADDRESS_MESSAGE}` })
  caller!: string;
}

/**
 * 발행 요청 DTO
 */
export class MintRequestDto extends AdminRequestDto {
  @ApiProperty({ description: '발행 받을 계정', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `to ${ADDRESS_MESSAGE}` })
  to!: string;

  @ApiProperty({ description: '수량 (최소 단위)', example: '123' })
  @IsString()
  @IsNotEmpty()
  @Matches(AMOUNT_PATTERN, { message: `amount ${AMOUNT_MESSAGE}` })
  amount!: string;
}

/**
 * 소각 요청 DTO
 */
export class BurnFromRequestDto extends AdminRequestDto {
  @ApiProperty({ description: '소각할 계정', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `from ${ADDRESS_MESSAGE}` })
  from!: string;

  @ApiProperty({ description: '수량 (최소 단위)', example: '200' })
  @IsString()
  @IsNotEmpty()
  @Matches(AMOUNT_PATTERN, { message: `amount ${AMOUNT_MESSAGE}` })
  amount!: string;
}

/**
 * 블랙리스트 추가/해제 요청 DTO
 */
export class BlacklistRequestDto extends AdminRequestDto {
  @ApiProperty({ description: '대상 계정', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `account ${ADDRESS_MESSAGE}` })
  account!: string;
}

/**
 * 발행/소각 응답 DTO
 */
export class SupplyResponseDto {
  @ApiProperty({ description: '변경 후 총 공급량 (최소 단위)', example: '1000123' })
  totalSupply!: string;
}

/**
 * 블랙리스트 조회 응답 DTO
 */
export class BlacklistStatusDto {
  @ApiProperty({ example: EXAMPLE_ADDRESS })
  account!: string;

  @ApiProperty({ example: false })
  blacklisted!: boolean;
}
