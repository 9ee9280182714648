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
 * 송금 요청 DTO
 *
 * caller가 곧 sender (인증은 이 시스템 밖에서 처리)
 */
export class TransferRequestDto {
  @ApiProperty({ description: '호출자 = 보내는 계정', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `caller ${ADDRESS_MESSAGE}` })
  caller!: string;

  @ApiProperty({ description: '받는 계정', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `to ${ADDRESS_MESSAGE}` })
  to!: string;

  @ApiProperty({ description: '수량 (최소 단위)', example: '100000' })
  @IsString()
  @IsNotEmpty()
  @Matches(AMOUNT_PATTERN, { message: `amount ${AMOUNT_MESSAGE}` })
  amount!: string;
}

/**
 * 위임 전송 요청 DTO
 *
 * caller가 spender, from이 owner
 */
export class TransferFromRequestDto {
  @ApiProperty({ description: '호출자 = spender', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `caller ${ADDRESS_MESSAGE}` })
  caller!: string;

  @ApiProperty({ description: '잔액을 내주는 owner', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `from ${ADDRESS_MESSAGE}` })
  from!: string;

  @ApiProperty({ description: '받는 계정', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `to ${ADDRESS_MESSAGE}` })
  to!: string;

  @ApiProperty({ description: '수량 (최소 단위)', example: '60000' })
  @IsString()
  @IsNotEmpty()
  @Matches(AMOUNT_PATTERN, { message: `amount ${AMOUNT_MESSAGE}` })
  amount!: string;
}

/**
 * 변경 작업 응답 DTO
 */
export class OperationResponseDto {
  @ApiProperty({ description: '성공 여부', example: true })
  success!: boolean;
}
