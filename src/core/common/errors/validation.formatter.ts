// src/core/common/errors/validation.formatter.ts

import { ValidationError } from 'class-validator';

/**
 * 格式化验证错误消息
 * 嵌套对象的字段带上父级属性路径前缀，例如 `session: gameId should not be empty`
 * @param errors 验证错误数组
 * @param parentPath 父级属性路径（递归内部使用）
 * @returns 格式化后的错误消息
 */
export function formatValidationErrors(errors: ValidationError[], parentPath = ''): string {
  const messages: string[] = [];

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    if (error.constraints) {
      for (const message of Object.values(error.constraints)) {
        messages.push(parentPath ? `${parentPath}: ${message}` : message);
      }
    }

    if (error.children && error.children.length > 0) {
      const childMessages = formatValidationErrors(error.children, path);
      if (childMessages) messages.push(childMessages);
    }
  }

  return messages.join('; ');
}
