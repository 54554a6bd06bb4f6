import { HttpStatus, ParseIntPipe, ParseUUIDPipe } from '@nestjs/common';

// Malformed path parameters are validation failures like any other: 422, not 400.
export const uuidParam = new ParseUUIDPipe({ errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY });
export const intParam = new ParseIntPipe({ errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY });
