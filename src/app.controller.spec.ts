import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService } from './app.service';

describe('AppController', () => {
  let appController: AppController;

  beforeEach(async () => {
    const app: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [AppService],
    }).compile();

    appController = app.get<AppController>(AppController);
  });

  it('should return service metadata', () => {
    expect(appController.getRoot()).toMatchObject({
      service: 'news-narrative-engine',
      version: '1.0.0',
    });
  });

  it('should report health', () => {
    expect(appController.getHealth()).toEqual({
      status: 'ok',
      service: 'news-narrative-engine',
    });
  });
});
