import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DwfMockModule, loadDwfMockConfig } from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    DwfMockModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        loadDwfMockConfig((key) => configService.get<string>(key)),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
