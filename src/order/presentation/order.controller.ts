import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';

import { ErrorCode } from '@common/exception';
import { parseIdPipe } from '@common/exception/request-validation';

// DTOs
import {
  CreateOrderRequest,
  OrderResponse,
  PartialReturnRequest,
} from './dto/order.dto';

// Use Cases
import { CreateOrderUseCase } from '@/order/application/create-order.use-case';
import { GetOrderDetailUseCase } from '@/order/application/get-order-detail.use-case';
import { CancelOrderUseCase } from '@/order/application/cancel-order.use-case';
import { PartialReturnUseCase } from '@/order/application/partial-return.use-case';

/**
 * Order Controller
 * 주문 생성/조회/취소/부분 반품 API 엔드포인트
 */
@ApiTags('orders')
@Controller('orders')
export class OrderController {
  constructor(
    private readonly createOrderUseCase: CreateOrderUseCase,
    private readonly getOrderDetailUseCase: GetOrderDetailUseCase,
    private readonly cancelOrderUseCase: CancelOrderUseCase,
    private readonly partialReturnUseCase: PartialReturnUseCase,
  ) {}

  /**
   * ANCHOR 주문 생성
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: '주문 생성',
    description: '재고를 차감하고 CONFIRMED 상태의 주문을 생성합니다.',
  })
  @ApiResponse({ status: 201, type: OrderResponse })
  @ApiResponse({ status: 400, description: '잘못된 입력 또는 재고 부족' })
  @ApiResponse({ status: 404, description: '상품을 찾을 수 없음' })
  async createOrder(
    @Body() dto: CreateOrderRequest,
  ): Promise<OrderResponse> {
    const result = await this.createOrderUseCase.execute(
      CreateOrderRequest.toCommand(dto),
    );

    return OrderResponse.fromResult(result);
  }

  /**
   * ANCHOR 주문 상세 조회
   */
  @Get(':orderId')
  @ApiOperation({ summary: '주문 상세 조회' })
  @ApiParam({ name: 'orderId', description: '주문 ID' })
  @ApiResponse({ status: 200, type: OrderResponse })
  @ApiResponse({ status: 404, description: '주문을 찾을 수 없음' })
  async getOrderDetail(
    @Param('orderId', parseIdPipe(ErrorCode.INVALID_ORDER_ID)) orderId: number,
  ): Promise<OrderResponse> {
    const result = await this.getOrderDetailUseCase.execute(orderId);

    return OrderResponse.fromResult(result);
  }

  /**
   * ANCHOR 주문 취소
   */
  @Post(':orderId/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: '주문 취소',
    description: '주문 수량을 재고로 되돌리고 CANCELLED로 전환합니다.',
  })
  @ApiParam({ name: 'orderId', description: '주문 ID' })
  @ApiResponse({ status: 200, type: OrderResponse })
  @ApiResponse({ status: 404, description: '주문 또는 상품을 찾을 수 없음' })
  @ApiResponse({ status: 409, description: 'CONFIRMED 상태가 아님' })
  async cancelOrder(
    @Param('orderId', parseIdPipe(ErrorCode.INVALID_ORDER_ID)) orderId: number,
  ): Promise<OrderResponse> {
    const result = await this.cancelOrderUseCase.execute(orderId);

    return OrderResponse.fromResult(result);
  }

  /**
   * ANCHOR 부분 반품
   */
  @Post(':orderId/partial-return')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: '부분 반품',
    description: '요청 수량만큼 주문 항목을 줄이고 재고를 복원합니다.',
  })
  @ApiParam({ name: 'orderId', description: '주문 ID' })
  @ApiResponse({ status: 200, type: OrderResponse })
  @ApiResponse({ status: 400, description: '잘못된 입력 또는 반품 수량 초과' })
  @ApiResponse({ status: 404, description: '주문 또는 상품을 찾을 수 없음' })
  @ApiResponse({ status: 409, description: 'CONFIRMED 상태가 아님' })
  async partialReturn(
    @Param('orderId', parseIdPipe(ErrorCode.INVALID_ORDER_ID)) orderId: number,
    @Body() dto: PartialReturnRequest,
  ): Promise<OrderResponse> {
    const result = await this.partialReturnUseCase.execute(
      PartialReturnRequest.toCommand(orderId, dto),
    );

    return OrderResponse.fromResult(result);
  }
}
