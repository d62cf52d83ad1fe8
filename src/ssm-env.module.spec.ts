import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { DynamicModule, Logger, Module } from '@nestjs/common';
import { GetParametersCommand, SSMClient } from '@aws-sdk/client-ssm';
import { SsmEnvModule } from './ssm-env.module';
import { SsmEnvService } from './ssm-env.service';
import { SSM_ENV_CONFIG, SSM_ENV_SOURCE } from './constants';
import { ModuleOptions } from './interface';
import { SsmParameterFetcherService } from './services';
import {
  GetParametersError,
  InvalidParametersError,
} from './errors/ssm-env.errors';

// Mock AWS SDK
jest.mock('@aws-sdk/client-ssm');

@Module({})
class TestConfigModule {}

const testConfigModule = (values: Record<string, unknown>): DynamicModule => ({
  module: TestConfigModule,
  providers: [
    {
      provide: ConfigService,
      useValue: { get: (key: string) => values[key] },
    },
  ],
  exports: [ConfigService],
});

describe('SsmEnvModule', () => {
  let mockSend: jest.Mock;
  let loggerLogSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();

    mockSend = jest.fn();
    (SSMClient as jest.MockedClass<typeof SSMClient>).mockImplementation(
      () => ({ send: mockSend }) as unknown as SSMClient,
    );

    loggerLogSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('register (static configuration)', () => {
    it('should resolve references in the environment on initialization', async () => {
      mockSend.mockResolvedValueOnce({
        Parameters: [{ Name: '/app/db/password', Value: 'db-secret' }],
        InvalidParameters: [],
      });

      const module: TestingModule = await Test.createTestingModule({
        imports: [
          SsmEnvModule.register({
            awsRegion: 'us-west-2',
            environment: {
              DB_HOST: 'db.internal',
              DB_PASSWORD: 'ssm:///app/db/password',
            },
          }),
        ],
      }).compile();

      expect(SSMClient).toHaveBeenCalledWith({ region: 'us-west-2' });
      expect(GetParametersCommand).toHaveBeenCalledWith({
        Names: ['/app/db/password'],
        WithDecryption: true,
      });
      expect(mockSend).toHaveBeenCalledTimes(1);
      expect(loggerLogSpy).toHaveBeenCalledWith(
        'Fetching SSM parameters - Keys: /app/db/password',
      );

      const service = module.get<SsmEnvService>(SsmEnvService);
      expect(service).toBeInstanceOf(SsmEnvService);
      expect(service.getAll()).toEqual({
        DB_HOST: 'db.internal',
        DB_PASSWORD: 'db-secret',
      });
    });

    it('should not call AWS when nothing is referenced', async () => {
      const module: TestingModule = await Test.createTestingModule({
        imports: [
          SsmEnvModule.register({
            awsRegion: 'us-east-1',
            environment: { NODE_ENV: 'test' },
          }),
        ],
      }).compile();

      expect(SSMClient).not.toHaveBeenCalled();
      expect(mockSend).not.toHaveBeenCalled();
      expect(module.get(SsmEnvService).get('NODE_ENV')).toBe('test');
    });

    it('should export the fetcher service', async () => {
      const module: TestingModule = await Test.createTestingModule({
        imports: [SsmEnvModule.register({ environment: {} })],
      }).compile();

      expect(module.get(SsmParameterFetcherService)).toBeInstanceOf(
        SsmParameterFetcherService,
      );
    });

    it('should capture the environment before resolution', async () => {
      mockSend.mockResolvedValueOnce({
        Parameters: [{ Name: 'token', Value: 'resolved-token' }],
      });
      const environment: NodeJS.ProcessEnv = { API_TOKEN: 'ssm://token' };

      const module: TestingModule = await Test.createTestingModule({
        imports: [
          SsmEnvModule.register({ environment, overwriteEnvironment: true }),
        ],
      }).compile();

      expect(module.get(SSM_ENV_SOURCE)).toEqual(['API_TOKEN=ssm://token']);
      expect(environment.API_TOKEN).toBe('resolved-token');
    });

    it('should fail startup when the fetch fails', async () => {
      mockSend.mockRejectedValueOnce(
        Object.assign(new Error('User is not authorized'), {
          name: 'AccessDeniedException',
        }),
      );

      await expect(
        Test.createTestingModule({
          imports: [
            SsmEnvModule.register({
              awsRegion: 'us-east-1',
              environment: { DB_PASSWORD: 'ssm:///app/db/password' },
            }),
          ],
        }).compile(),
      ).rejects.toBeInstanceOf(GetParametersError);
    });

    it('should fail startup when parameters are invalid', async () => {
      mockSend.mockResolvedValueOnce({
        Parameters: [],
        InvalidParameters: ['/app/db/password'],
      });

      await expect(
        Test.createTestingModule({
          imports: [
            SsmEnvModule.register({
              environment: { DB_PASSWORD: 'ssm:///app/db/password' },
            }),
          ],
        }).compile(),
      ).rejects.toBeInstanceOf(InvalidParametersError);
    });
  });

  describe('registerAsync (async configuration)', () => {
    const variable = 'SSM_ENV_MODULE_TEST_SECRET';

    beforeEach(() => {
      process.env[variable] = 'ssm:///test/secret';
    });

    afterEach(() => {
      delete process.env[variable];
    });

    it('should read options from ConfigService', async () => {
      mockSend.mockResolvedValueOnce({
        Parameters: [{ Name: '/test/secret', Value: 'test-value' }],
      });

      const module: TestingModule = await Test.createTestingModule({
        imports: [
          SsmEnvModule.registerAsync({
            imports: [
              testConfigModule({
                'ssm-env.awsRegion': 'eu-central-1',
                'ssm-env.timeoutMs': '5000',
                'ssm-env.enableParameterLogging': 'false',
              }),
            ],
            useClass: ConfigService,
          }),
        ],
      }).compile();

      expect(module.get<ModuleOptions>(SSM_ENV_CONFIG)).toEqual({
        awsRegion: 'eu-central-1',
        overwriteEnvironment: false,
        timeoutMs: 5000,
        enableParameterLogging: false,
      });
      expect(SSMClient).toHaveBeenCalledWith({ region: 'eu-central-1' });
      expect(mockSend).toHaveBeenCalledWith(expect.any(GetParametersCommand), {
        abortSignal: expect.any(AbortSignal),
      });

      const service = module.get<SsmEnvService>(SsmEnvService);
      expect(service.get(variable)).toBe('test-value');
      expect(process.env[variable]).toBe('ssm:///test/secret');
    });

    it('should write resolved values into process.env when configured', async () => {
      mockSend.mockResolvedValueOnce({
        Parameters: [{ Name: '/test/secret', Value: 'test-value' }],
      });

      await Test.createTestingModule({
        imports: [
          SsmEnvModule.registerAsync({
            imports: [
              testConfigModule({ 'ssm-env.overwriteEnvironment': 'true' }),
            ],
            useClass: ConfigService,
          }),
        ],
      }).compile();

      expect(SSMClient).toHaveBeenCalledWith({});
      expect(process.env[variable]).toBe('test-value');
    });

    it('should reject an invalid timeout', async () => {
      await expect(
        Test.createTestingModule({
          imports: [
            SsmEnvModule.registerAsync({
              imports: [testConfigModule({ 'ssm-env.timeoutMs': 'soon' })],
              useClass: ConfigService,
            }),
          ],
        }).compile(),
      ).rejects.toThrow(
        "ssm-env.timeoutMs must be a non-negative number. Received: 'soon'",
      );
    });
  });
});
