import { BadRequestException } from '@nestjs/common';

export class InvalidInputError extends BadRequestException {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}
