import { INestApplication } from '@nestjs/common';
import { DomainExceptionFilter } from '@common/exception/domain-exception.filter';
import { ValidationExceptionFilter } from '@common/exception/validation-exception.filter';
import { RepositoryExceptionFilter } from '@common/exception/repository-exception.filter';
import { createValidationPipe } from '@common/exception/request-validation';

export const API_PREFIX = 'api/v1';

/**
 * 전역 prefix, 파이프, 예외 필터 설정
 * main.ts와 E2E 테스트가 같은 설정을 사용한다.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.setGlobalPrefix(API_PREFIX);

  // Global Exception Filters
  app.useGlobalFilters(
    new DomainExceptionFilter(),
    new ValidationExceptionFilter(),
    new RepositoryExceptionFilter(),
  );

  // Global Validation Pipe
  app.useGlobalPipes(createValidationPipe());

  app.enableShutdownHooks();
  return app;
}
