import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { getServerConfig } from '@common/config/app.config';

// validation and exception modules
import { Logger, ValidationPipe } from '@nestjs/common';
import { DomainExceptionFilter } from '@common/exception/domain-exception.filter';
import { ValidationExceptionFilter } from '@common/exception/validation-exception.filter';
import { RepositoryExceptionFilter } from '@common/exception/repository-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = getServerConfig();

  // Global Exception Filters
  app.useGlobalFilters(
    new DomainExceptionFilter(),
    new ValidationExceptionFilter(),
    new RepositoryExceptionFilter(),
  );

  // Global Validation Pipe
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );

  // SQLite 연결은 종료 시그널에서 onModuleDestroy로 닫힌다
  app.enableShutdownHooks();

  // Swagger Setup
  if (config.swaggerEnabled) {
    const swagger = await import('@nestjs/swagger');
    const DocumentBuilder = swagger.DocumentBuilder;
    const SwaggerModule = swagger.SwaggerModule;

    const swaggerConfig = new DocumentBuilder()
      .setTitle('Stock Catalog API')
      .setDescription('상품 카탈로그 및 재고 트랜잭션 API')
      .setVersion('1.0')
      .build();
    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('api', app, document);
  }

  // Start Application
  await app.listen(config.port);
}
bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    '애플리케이션 기동 실패',
    error instanceof Error ? error.stack : error,
  );
  process.exit(1);
});
