import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Logger, Param, Post, Put, Query } from '@nestjs/common';
import { CategoryNotFoundError } from '../common/errors/catalog.errors';
import { PaginationQueryDto } from '../common/dto/pagination-query.dto';
import { uuidParam } from '../common/pipes/param-pipes';
import { Page } from '../common/types/page';
import { CategoriesService } from './categories.service';
import { CreateCategoryDto, UpdateCategoryDto } from './dto/category.dto';
import { Category } from './entities/category.entity';

@Controller('categories')
export class CategoriesController {
    private readonly logger = new Logger(CategoriesController.name);

    constructor(private readonly categoriesService: CategoriesService) {}

    @Post()
    async create(@Body() dto: CreateCategoryDto): Promise<Category> {
        this.logger.log(`Creating category "${dto.name}"`);
        return this.categoriesService.create(dto);
    }

    @Get()
    async findAll(@Query() query: PaginationQueryDto): Promise<Page<Category>> {
        return this.categoriesService.findAll(query.limit, query.offset);
    }

    @Get('slug/:slug')
    async findBySlug(@Param('slug') slug: string): Promise<Category> {
        return this.categoriesService.findBySlug(slug);
    }

    @Get(':id/children')
    async findChildren(@Param('id', uuidParam) id: string): Promise<Category[]> {
        return this.categoriesService.findChildren(id);
    }

    @Get(':id')
    async findOne(@Param('id', uuidParam) id: string): Promise<Category> {
        return this.categoriesService.findOne(id);
    }

    @Put(':id')
    async update(@Param('id', uuidParam) id: string, @Body() dto: UpdateCategoryDto): Promise<Category> {
        return this.categoriesService.update(id, dto);
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    async remove(@Param('id', uuidParam) id: string): Promise<void> {
        this.logger.log(`Deleting category ${id}`);
        const deleted = await this.categoriesService.remove(id);
        if (!deleted) {
            throw new CategoryNotFoundError(id);
        }
    }
}
