import { Module } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { IProductRepository } from '@/product/domain/interfaces/product.repository.interface';
import { ProductMemoryRepository } from '@/product/infrastructure/product.memory.repository';
import { ProductController } from '@/product/presentation/product.controller';

// Use Cases
import { CreateProductUseCase } from '@/product/application/create-product.use-case';
import { GetProductsUseCase } from '@/product/application/get-products.use-case';
import { GetProductDetailUseCase } from '@/product/application/get-product-detail.use-case';
import { UpdateProductUseCase } from '@/product/application/update-product.use-case';
import { DeleteProductUseCase } from '@/product/application/delete-product.use-case';

/**
 * Product Module
 * 상품 카탈로그 모듈
 */
@Module({
  imports: [],
  controllers: [ProductController],
  providers: [
    // Product Repository
    ProductMemoryRepository,
    {
      provide: IProductRepository,
      useExisting: ProductMemoryRepository,
    },

    // Domain Service
    ProductDomainService,

    // Use Cases
    CreateProductUseCase,
    GetProductsUseCase,
    GetProductDetailUseCase,
    UpdateProductUseCase,
    DeleteProductUseCase,
  ],
  exports: [ProductDomainService, IProductRepository],
})
export class ProductModule {}
