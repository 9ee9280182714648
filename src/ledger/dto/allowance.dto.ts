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
 * 허용량 설정 요청 DTO (덮어쓰기)
 *
 * caller가 owner, amount 0은 승인 취소
 */
export class ApproveRequestDto {
  @ApiProperty({ description: '호출자 = owner', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `caller ${ADDRESS_MESSAGE}` })
  caller!: string;

  @ApiProperty({ description: 'spender', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `spender ${ADDRESS_MESSAGE}` })
  spender!: string;

  @ApiProperty({ description: '허용량 (최소 단위, 0 = 취소)', example: '200000' })
  @IsString()
  @IsNotEmpty()
  @Matches(AMOUNT_PATTERN, { message: `amount ${AMOUNT_MESSAGE}` })
  amount!: string;
}

/**
 * 허용량 증가/감소 요청 DTO
 */
export class AllowanceChangeRequestDto {
  @ApiProperty({ description: '호출자 = owner', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `caller ${ADDRESS_MESSAGE}` })
  caller!: string;

  @ApiProperty({ description: 'spender', example: EXAMPLE_ADDRESS })
  @IsString()
  @Matches(ADDRESS_PATTERN, { message: `spender ${ADDRESS_MESSAGE}` })
  spender!: string;

  @ApiProperty({ description: '증감량 (최소 단위, 양수)', example: '5' })
  @IsString()
  @IsNotEmpty()
  @Matches(AMOUNT_PATTERN, { message: `delta ${AMOUNT_MESSAGE}` })
  delta!: string;
}

/**
 * 허용량 조회 응답 DTO
 */
export class AllowanceResponseDto {
  @ApiProperty({ example: EXAMPLE_ADDRESS })
  owner!: string;

  @ApiProperty({ example: EXAMPLE_ADDRESS })
  spender!: string;

  @ApiProperty({ description: '허용량 (최소 단위)', example: '140000' })
  allowance!: string;
}
