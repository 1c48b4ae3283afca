import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import {
  CreateProductCommand,
  GetProductsQuery,
  ProductResult,
  UpdateProductCommand,
} from '@/product/application/dto/product.dto';

/**
 * 상품 등록 요청 DTO
 */
export class CreateProductRequest {
  @ApiProperty({ description: '상품명', example: '아스피린 100mg' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ description: 'SKU', example: 'ASP-100' })
  @IsString()
  @IsNotEmpty()
  sku!: string;

  @ApiProperty({ description: '가격', example: 4.5, minimum: 0 })
  @IsNumber()
  @Min(0)
  price!: number;

  @ApiProperty({ description: '재고 수량', example: 10, minimum: 0 })
  @IsInt()
  @Min(0)
  stock!: number;

  static toCommand(dto: CreateProductRequest): CreateProductCommand {
    return new CreateProductCommand(dto.name, dto.sku, dto.price, dto.stock);
  }
}

/**
 * 상품 수정 요청 DTO
 * SKU는 수정할 수 없다.
 */
export class UpdateProductRequest {
  @ApiProperty({ description: '상품명', example: '아스피린 100mg' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ description: '가격', example: 5, minimum: 0 })
  @IsNumber()
  @Min(0)
  price!: number;

  @ApiProperty({ description: '재고 수량', example: 20, minimum: 0 })
  @IsInt()
  @Min(0)
  stock!: number;

  static toCommand(
    productId: number,
    dto: UpdateProductRequest,
  ): UpdateProductCommand {
    return new UpdateProductCommand(productId, dto.name, dto.price, dto.stock);
  }
}

/**
 * 상품 목록 조회 요청 DTO (쿼리 파라미터)
 */
export class GetProductsRequest {
  @ApiPropertyOptional({ description: '상품명 부분 일치 (대소문자 무시)' })
  @IsOptional()
  @IsString()
  name?: string;

  @ApiPropertyOptional({ description: '최소 가격 (포함)', minimum: 0 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  minPrice?: number;

  @ApiPropertyOptional({ description: '최대 가격 (포함)', minimum: 0 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  maxPrice?: number;

  static toQuery(dto: GetProductsRequest): GetProductsQuery {
    return new GetProductsQuery(dto.name, dto.minPrice, dto.maxPrice);
  }
}

/**
 * 상품 응답 DTO
 */
export class ProductResponse {
  @ApiProperty({ description: '상품 ID' })
  id!: number;

  @ApiProperty({ description: '상품명' })
  name!: string;

  @ApiProperty({ description: 'SKU' })
  sku!: string;

  @ApiProperty({ description: '가격' })
  price!: number;

  @ApiProperty({ description: '재고 수량' })
  stock!: number;

  static fromResult(result: ProductResult): ProductResponse {
    const response = new ProductResponse();
    response.id = result.id;
    response.name = result.name;
    response.sku = result.sku;
    response.price = result.price;
    response.stock = result.stock;
    return response;
  }
}
