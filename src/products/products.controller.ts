import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Logger, Param, Post, Put, Query } from '@nestjs/common';
import { ProductNotFoundError } from '../common/errors/catalog.errors';
import { uuidParam } from '../common/pipes/param-pipes';
import { Page } from '../common/types/page';
import { CreateProductDto } from './dto/create-product.dto';
import { ListProductsQueryDto, ProductFilterQueryDto, SearchProductsQueryDto } from './dto/list-products-query.dto';
import { ProductResponse } from './dto/product-response.dto';
import { UpdateProductDto } from './dto/update-product.dto';
import { ProductsService } from './products.service';

@Controller('products')
export class ProductsController {
    private readonly logger = new Logger(ProductsController.name);

    constructor(private readonly productsService: ProductsService) {}

    @Get()
    async findAll(@Query() query: ListProductsQueryDto): Promise<Page<ProductResponse>> {
        return this.productsService.findAll(query);
    }

    // Literal segments are declared before ':id' so they are not read as ids.
    @Get('search')
    async search(@Query() query: SearchProductsQueryDto): Promise<Page<ProductResponse>> {
        return this.productsService.search(query);
    }

    @Get('category/:categoryId')
    async findByCategory(
        @Param('categoryId', uuidParam) categoryId: string,
        @Query() query: ProductFilterQueryDto,
    ): Promise<Page<ProductResponse>> {
        return this.productsService.findByCategory(categoryId, query);
    }

    @Get('sku/:sku')
    async findBySku(@Param('sku') sku: string): Promise<ProductResponse> {
        return this.productsService.findBySku(sku);
    }

    @Get('slug/:slug')
    async findBySlug(@Param('slug') slug: string): Promise<ProductResponse> {
        return this.productsService.findBySlug(slug);
    }

    @Get(':id')
    async findOne(@Param('id', uuidParam) id: string): Promise<ProductResponse> {
        return this.productsService.findOne(id);
    }

    @Post()
    async create(@Body() dto: CreateProductDto): Promise<ProductResponse> {
        this.logger.log(`Creating product "${dto.name}" (sku: ${dto.sku})`);
        return this.productsService.create(dto);
    }

    @Put(':id')
    async update(@Param('id', uuidParam) id: string, @Body() dto: UpdateProductDto): Promise<ProductResponse> {
        return this.productsService.update(id, dto);
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    async remove(@Param('id', uuidParam) id: string): Promise<void> {
        this.logger.log(`Deleting product ${id}`);
        const deleted = await this.productsService.remove(id);
        if (!deleted) {
            throw new ProductNotFoundError(id);
        }
    }
}
