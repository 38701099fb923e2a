// src/core/common/errors/validate-input.decorator.ts

import { BadRequestException, UsePipes, ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { formatValidationErrors } from './validation.formatter';

/**
 * 输入验证装饰器
 * 为 GraphQL resolver 方法提供标准的输入验证；错误以 `errorCode = INVALID_INPUT` 返回
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
export const ValidateInput = () =>
  UsePipes(
    new ValidationPipe({
      whitelist: true, // 自动移除非装饰器属性
      forbidNonWhitelisted: true,
      transform: true,
      stopAtFirstError: false,
      validationError: {
        target: false,
        value: false,
      },
      exceptionFactory: (errors: ValidationError[]) =>
        new BadRequestException({
          errorCode: 'INVALID_INPUT',
          errorMessage: formatValidationErrors(errors),
        }),
    }),
  );
