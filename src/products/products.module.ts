import { Module } from '@nestjs/common';
import { MysqlProductsRepository } from './mysql-products.repository';
import { ProductSeedService } from './product-seed.service';
import { ProductsController } from './products.controller';
import { ProductsRepository } from './products.repository';
import { ProductsService } from './products.service';

@Module({
  controllers: [ProductsController],
  providers: [
    ProductsService,
    ProductSeedService,
    { provide: ProductsRepository, useClass: MysqlProductsRepository }
  ],
  exports: [ProductsService]
})
export class ProductsModule {}
