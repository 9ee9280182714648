import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { LEDGER_CONFIG, LedgerConfig } from './common/config/ledger.config';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  // DTO 검증 파이프 전역 설정
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // DTO에 없는 속성 제거
      forbidNonWhitelisted: true, // DTO에 없는 속성 있으면 에러
      transform: true,
    }),
  );

  // 종료 시그널에서 큐를 비운 뒤(onModuleDestroy) LevelDB를 닫음(onApplicationShutdown)
  app.enableShutdownHooks();

  // Swagger 설정
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Token Ledger API')
      .setDescription('관리자가 있는 토큰 원장 API 문서')
      .setVersion('1.0')
      .addTag('ledger', '잔액, 허용량, 발행/소각, 일시 정지, 블랙리스트')
      .build(),
  );
  SwaggerModule.setup('api', app, document);

  const config = app.get<LedgerConfig>(LEDGER_CONFIG);
  await app.listen(config.port);
  logger.log(`Application is running on: http://localhost:${config.port}`);
  logger.log(`Swagger UI: http://localhost:${config.port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error);
  process.exit(1);
});
