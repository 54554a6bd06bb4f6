/**
 * Domain errors raised by services and repositories. They carry no HTTP
 * knowledge; CatalogExceptionFilter maps them to status codes.
 */
export abstract class CatalogError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends CatalogError {
  constructor(
    readonly entity: string,
    readonly lookup: string,
    readonly value: string | number,
  ) {
    super(`${entity} with ${lookup} ${value} not found`);
  }
}

export class ProductNotFoundError extends NotFoundError {
  constructor(value: string, lookup = 'ID') {
    super('Product', lookup, value);
  }
}

export class CategoryNotFoundError extends NotFoundError {
  constructor(value: string, lookup = 'ID') {
    super('Category', lookup, value);
  }
}

export class BrandNotFoundError extends NotFoundError {
  constructor(value: string, lookup = 'ID') {
    super('Brand', lookup, value);
  }
}

export class DummyNotFoundError extends NotFoundError {
  constructor(value: number | string, lookup = 'ID') {
    super('Dummy', lookup, value);
  }
}

/** A domain invariant was violated (empty name, negative price, ...). */
export class InvalidEntityError extends CatalogError {
  constructor(message: string) {
    super(message);
  }
}

/** A unique constraint rejected the write. `field` is the offending column when known. */
export class DuplicateValueError extends CatalogError {
  constructor(
    readonly table: string,
    readonly field: string | null,
    readonly value: string | null,
  ) {
    super(DuplicateValueError.describe(table, field, value));
  }

  private static describe(table: string, field: string | null, value: string | null): string {
    if (field && value) {
      return `A ${table} with ${field} "${value}" already exists`;
    }
    if (field) {
      return `A ${table} with this ${field} already exists`;
    }
    return `The ${table} conflicts with an existing record`;
  }
}
