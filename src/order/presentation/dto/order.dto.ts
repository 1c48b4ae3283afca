import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsPositive,
  IsString,
  ValidateNested,
} from 'class-validator';
import {
  CreateOrderCommand,
  OrderResult,
  PartialReturnCommand,
} from '@/order/application/dto/order.dto';

/**
 * 주문/반품 항목 요청 DTO
 */
export class OrderItemRequestDto {
  @ApiProperty({ description: '상품 ID', example: 1 })
  @IsInt()
  @IsPositive()
  productId!: number;

  @ApiProperty({ description: '수량', example: 2, minimum: 1 })
  @IsInt()
  @IsPositive()
  quantity!: number;
}

/**
 * 주문 생성 요청 DTO
 */
export class CreateOrderRequest {
  @ApiProperty({ description: '고객명', example: 'John' })
  @IsString()
  @IsNotEmpty()
  customerName!: string;

  @ApiProperty({
    description: '주문 상품 목록 (같은 상품이 여러 번 나올 수 있음)',
    type: [OrderItemRequestDto],
  })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => OrderItemRequestDto)
  items!: OrderItemRequestDto[];

  static toCommand(dto: CreateOrderRequest): CreateOrderCommand {
    return new CreateOrderCommand(
      dto.customerName,
      dto.items.map((item) => ({
        productId: item.productId,
        quantity: item.quantity,
      })),
    );
  }
}

/**
 * 부분 반품 요청 DTO
 */
export class PartialReturnRequest {
  @ApiProperty({ description: '반품 상품 목록', type: [OrderItemRequestDto] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => OrderItemRequestDto)
  items!: OrderItemRequestDto[];

  static toCommand(
    orderId: number,
    dto: PartialReturnRequest,
  ): PartialReturnCommand {
    return new PartialReturnCommand(
      orderId,
      dto.items.map((item) => ({
        productId: item.productId,
        quantity: item.quantity,
      })),
    );
  }
}

/**
 * 주문 항목 응답 DTO
 */
export class OrderItemResponseDto {
  @ApiProperty({ description: '상품 ID' })
  productId!: number;

  @ApiProperty({ description: '수량' })
  quantity!: number;
}

/**
 * 주문 응답 DTO
 */
export class OrderResponse {
  @ApiProperty({ description: '주문 ID' })
  id!: number;

  @ApiProperty({ description: '고객명' })
  customerName!: string;

  @ApiProperty({ description: '주문 항목 목록', type: [OrderItemResponseDto] })
  items!: OrderItemResponseDto[];

  @ApiProperty({
    description: '주문 상태',
    enum: ['Pending', 'Confirmed', 'Cancelled'],
  })
  status!: string;

  @ApiProperty({ description: '주문 생성 시각' })
  createdAt!: Date;

  @ApiProperty({ description: '최종 수정 시각' })
  updatedAt!: Date;

  static fromResult(result: OrderResult): OrderResponse {
    const response = new OrderResponse();
    response.id = result.id;
    response.customerName = result.customerName;
    response.items = result.items.map((item) => ({
      productId: item.productId,
      quantity: item.quantity,
    }));
    response.status = result.status;
    response.createdAt = result.createdAt;
    response.updatedAt = result.updatedAt;
    return response;
  }
}
