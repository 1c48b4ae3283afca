import { Module } from '@nestjs/common';

// GLOBAL MODULES
import { GlobalTransactionModule } from './@common/transaction-manager/transaction.module';

// APP MODULES
import { ProductModule } from './product/product.module';
import { OrderModule } from './order/order.module';

@Module({
  imports: [
    // GLOBAL
    GlobalTransactionModule,

    // APP MODULES
    ProductModule,
    OrderModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
