import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  Query,
  Req
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiBody,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiResponse,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse
} from '@nestjs/swagger';
import { OpenRead } from '../auth/decorators/open-read.decorator';
import { RequireRole } from '../auth/decorators/require-role.decorator';
import { Role } from '../auth/enums/role.enum';
import type { AuthenticatedRequest } from '../auth/interfaces/authenticated-request';
import { Product, ProductResponseDto, ProductSort } from './product.entity';
import { CreateProductDto, ListProductsQueryDto, UpdateProductDto } from './products.dto';
import { ProductsService } from './products.service';

// Non-numeric ids are a validation failure, like a bad body.
const idPipe = new ParseIntPipe({ errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY });

/**
 * Reads need any valid token (or none when PRODUCT_READS_PUBLIC=true).
 * Every mutation needs the admin role.
 */
@ApiTags('Products')
@ApiBearerAuth('bearer')
@ApiUnauthorizedResponse({ description: 'Missing or invalid JWT token' })
@Controller('products')
export class ProductsController {
  constructor(private readonly productsService: ProductsService) {}

  @Get()
  @OpenRead()
  @ApiOperation({ summary: 'List products, optionally sorted' })
  @ApiResponse({ status: 200, description: 'Products', type: [ProductResponseDto] })
  @ApiUnprocessableEntityResponse({ description: 'Unknown sort field or direction' })
  findAll(@Query() query: ListProductsQueryDto): Promise<Product[]> {
    const sort: ProductSort | undefined = query.sort ? { field: query.sort, order: query.order ?? 'asc' } : undefined;
    return this.productsService.findAll(sort);
  }

  @Get(':id')
  @OpenRead()
  @ApiOperation({ summary: 'Get one product' })
  @ApiResponse({ status: 200, description: 'Product', type: ProductResponseDto })
  @ApiNotFoundResponse({ description: 'Product not found' })
  findOne(@Param('id', idPipe) id: number): Promise<Product> {
    return this.productsService.findOne(id);
  }

  @Post()
  @RequireRole(Role.ADMIN)
  @ApiOperation({ summary: 'Create a product (admin only)' })
  @ApiBody({ type: CreateProductDto })
  @ApiResponse({ status: 201, description: 'Product created', type: ProductResponseDto })
  @ApiForbiddenResponse({ description: 'Caller is not an admin' })
  @ApiUnprocessableEntityResponse({ description: 'Invalid input data' })
  create(@Req() req: AuthenticatedRequest, @Body() dto: CreateProductDto): Promise<Product> {
    return this.productsService.create(dto, req.user?.username);
  }

  @Put(':id')
  @RequireRole(Role.ADMIN)
  @ApiOperation({ summary: 'Replace a product (admin only)', description: 'Omitted optional fields are reset.' })
  @ApiBody({ type: CreateProductDto })
  @ApiResponse({ status: 200, description: 'Product replaced', type: ProductResponseDto })
  @ApiForbiddenResponse({ description: 'Caller is not an admin' })
  @ApiNotFoundResponse({ description: 'Product not found' })
  @ApiUnprocessableEntityResponse({ description: 'Invalid input data' })
  replace(@Param('id', idPipe) id: number, @Body() dto: CreateProductDto): Promise<Product> {
    return this.productsService.update(id, {
      name: dto.name,
      price: dto.price,
      description: dto.description ?? null,
      quantity: dto.quantity ?? 0
    });
  }

  @Patch(':id')
  @RequireRole(Role.ADMIN)
  @ApiOperation({ summary: 'Partially update a product (admin only)' })
  @ApiBody({ type: UpdateProductDto })
  @ApiResponse({ status: 200, description: 'Product updated', type: ProductResponseDto })
  @ApiForbiddenResponse({ description: 'Caller is not an admin' })
  @ApiNotFoundResponse({ description: 'Product not found' })
  @ApiUnprocessableEntityResponse({ description: 'Invalid input data' })
  update(@Param('id', idPipe) id: number, @Body() dto: UpdateProductDto): Promise<Product> {
    return this.productsService.update(id, dto);
  }

  @Delete(':id')
  @RequireRole(Role.ADMIN)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a product (admin only)' })
  @ApiResponse({ status: 204, description: 'Product deleted' })
  @ApiForbiddenResponse({ description: 'Caller is not an admin' })
  @ApiNotFoundResponse({ description: 'Product not found' })
  remove(@Param('id', idPipe) id: number): Promise<void> {
    return this.productsService.remove(id);
  }
}
