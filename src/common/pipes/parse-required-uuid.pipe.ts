import { BadRequestException, PipeTransform } from '@nestjs/common';
import { isUUID } from 'class-validator';

/** Route param guard for entity ids (players, seasons, matches). */
export class ParseRequiredUuidPipe implements PipeTransform<string, string> {
  constructor(private readonly paramName: string) {}

  transform(value: string): string {
    if (!value || !isUUID(value)) {
      throw new BadRequestException({
        statusCode: 400,
        code: 'INVALID_ID_PARAM',
        message: `Invalid ${this.paramName}: must be a UUID`,
      });
    }

    return value;
  }
}
