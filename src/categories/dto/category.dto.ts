import { IsNotEmpty, IsOptional, IsString, IsUUID, Length, Matches } from 'class-validator';

export class CreateCategoryDto {
  @IsString({ message: 'Category name must be a string.' })
  @IsNotEmpty({ message: 'Category name is required and cannot be empty.' })
  @Length(1, 255, { message: 'Category name must be between 1 and 255 characters.' })
  name!: string;

  @IsString({ message: 'Slug must be a string.' })
  @Matches(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, { message: 'Slug may only contain lower-case letters, digits and single hyphens.' })
  @IsOptional()
  slug?: string;

  @IsString({ message: 'Description must be a string.' })
  @IsOptional()
  description?: string | null;

  @IsUUID('all', { message: 'parentId must be a valid UUID.' })
  @IsOptional()
  parentId?: string | null;
}

export class UpdateCategoryDto {
  @IsString({ message: 'Category name must be a string.' })
  @IsNotEmpty({ message: 'Category name cannot be empty.' })
  @Length(1, 255, { message: 'Category name must be between 1 and 255 characters.' })
  @IsOptional()
  name?: string;

  @IsString({ message: 'Slug must be a string.' })
  @Matches(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, { message: 'Slug may only contain lower-case letters, digits and single hyphens.' })
  @IsOptional()
  slug?: string;

  @IsString({ message: 'Description must be a string.' })
  @IsOptional()
  description?: string | null;

  // null turns the category into a root.
  @IsUUID('all', { message: 'parentId must be a valid UUID.' })
  @IsOptional()
  parentId?: string | null;
}
