import * as fs from 'fs';
import * as path from 'path';
import { plainToInstance, Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsString,
  Matches,
  Min,
  ValidateNested,
  validateSync,
} from 'class-validator';
import { ProductDefinition } from '../core';
import { describeValidationErrors } from '../adapters/providers/hmac';

class ProductDefinitionDto implements ProductDefinition {
  @IsString()
  @IsNotEmpty()
  kind!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsInt()
  @Min(0)
  amount!: number;

  @Matches(/^[A-Z]{3}$/)
  currency!: string;

  @IsBoolean()
  requiresEnrichment!: boolean;
}

class ProductCatalogFileDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => ProductDefinitionDto)
  products!: ProductDefinitionDto[];
}

/**
 * Validate catalog entries; amounts are in minor units
 */
export function parseProductDefinitions(data: unknown): ProductDefinition[] {
  const file = plainToInstance(ProductCatalogFileDto, { products: data });
  const errors = validateSync(file);
  if (errors.length > 0) {
    throw new Error(`Invalid product catalog: ${describeValidationErrors(errors).join('; ')}`);
  }

  return file.products.map((product) => ({
    kind: product.kind,
    name: product.name,
    amount: product.amount,
    currency: product.currency,
    requiresEnrichment: product.requiresEnrichment,
  }));
}

/**
 * Read the product catalog JSON file, relative to the working directory
 */
export function loadProductDefinitions(catalogPath: string): ProductDefinition[] {
  const resolved = path.resolve(process.cwd(), catalogPath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  return parseProductDefinitions(raw);
}
