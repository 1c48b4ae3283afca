import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';

import { ErrorCode } from '@common/exception';
import { parseIdPipe } from '@common/exception/request-validation';

// DTOs
import {
  CreateProductRequest,
  GetProductsRequest,
  ProductResponse,
  UpdateProductRequest,
} from './dto/product.dto';

// Use Cases
import { CreateProductUseCase } from '@/product/application/create-product.use-case';
import { GetProductsUseCase } from '@/product/application/get-products.use-case';
import { GetProductDetailUseCase } from '@/product/application/get-product-detail.use-case';
import { UpdateProductUseCase } from '@/product/application/update-product.use-case';
import { DeleteProductUseCase } from '@/product/application/delete-product.use-case';

/**
 * Product Controller
 * 상품 카탈로그 API 엔드포인트
 */
@ApiTags('products')
@Controller('products')
export class ProductController {
  constructor(
    private readonly createProductUseCase: CreateProductUseCase,
    private readonly getProductsUseCase: GetProductsUseCase,
    private readonly getProductDetailUseCase: GetProductDetailUseCase,
    private readonly updateProductUseCase: UpdateProductUseCase,
    private readonly deleteProductUseCase: DeleteProductUseCase,
  ) {}

  /**
   * ANCHOR 상품 등록
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: '상품 등록' })
  @ApiResponse({ status: 201, type: ProductResponse })
  @ApiResponse({ status: 400, description: '잘못된 입력' })
  async createProduct(
    @Body() dto: CreateProductRequest,
  ): Promise<ProductResponse> {
    const result = await this.createProductUseCase.execute(
      CreateProductRequest.toCommand(dto),
    );

    return ProductResponse.fromResult(result);
  }

  /**
   * ANCHOR 상품 목록 조회
   */
  @Get()
  @ApiOperation({
    summary: '상품 목록 조회',
    description: '상품명 부분 일치와 가격 범위로 상품을 조회합니다.',
  })
  @ApiResponse({ status: 200, type: [ProductResponse] })
  async getProducts(
    @Query() dto: GetProductsRequest,
  ): Promise<ProductResponse[]> {
    const result = await this.getProductsUseCase.execute(
      GetProductsRequest.toQuery(dto),
    );

    return result.map((product) => ProductResponse.fromResult(product));
  }

  /**
   * ANCHOR 상품 상세 조회
   */
  @Get(':productId')
  @ApiOperation({ summary: '상품 상세 조회' })
  @ApiParam({ name: 'productId', description: '상품 ID' })
  @ApiResponse({ status: 200, type: ProductResponse })
  @ApiResponse({ status: 404, description: '상품을 찾을 수 없음' })
  async getProductDetail(
    @Param('productId', parseIdPipe(ErrorCode.INVALID_PRODUCT_ID)) productId: number,
  ): Promise<ProductResponse> {
    const result = await this.getProductDetailUseCase.execute(productId);

    return ProductResponse.fromResult(result);
  }

  /**
   * ANCHOR 상품 수정
   */
  @Put(':productId')
  @ApiOperation({ summary: '상품 수정' })
  @ApiParam({ name: 'productId', description: '상품 ID' })
  @ApiResponse({ status: 200, type: ProductResponse })
  @ApiResponse({ status: 404, description: '상품을 찾을 수 없음' })
  async updateProduct(
    @Param('productId', parseIdPipe(ErrorCode.INVALID_PRODUCT_ID)) productId: number,
    @Body() dto: UpdateProductRequest,
  ): Promise<ProductResponse> {
    const result = await this.updateProductUseCase.execute(
      UpdateProductRequest.toCommand(productId, dto),
    );

    return ProductResponse.fromResult(result);
  }

  /**
   * ANCHOR 상품 삭제
   */
  @Delete(':productId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: '상품 삭제' })
  @ApiParam({ name: 'productId', description: '상품 ID' })
  @ApiResponse({ status: 204, description: '삭제 완료' })
  @ApiResponse({ status: 404, description: '상품을 찾을 수 없음' })
  async deleteProduct(
    @Param('productId', parseIdPipe(ErrorCode.INVALID_PRODUCT_ID)) productId: number,
  ): Promise<void> {
    await this.deleteProductUseCase.execute(productId);
  }
}
