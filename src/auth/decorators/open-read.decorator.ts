import { SetMetadata } from '@nestjs/common';

export const OPEN_READ_KEY = 'auth:openRead';

/**
 * Read endpoint that accepts anonymous callers when PRODUCT_READS_PUBLIC=true.
 * A presented token is still verified; with the flag off a token is required.
 */
export const OpenRead = () => SetMetadata(OPEN_READ_KEY, true);
