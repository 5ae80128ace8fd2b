import { join } from 'path';
import { BackupAgentApplication, ExitCode, InitializationError, main } from '../src/index';
import { BackupManager } from '../src/clients/BackupManager';
import { CronScheduler } from '../src/clients/CronScheduler';
import { HealthchecksNotifier, NoopNotifier } from '../src/clients/HealthchecksNotifier';
import { RunReport } from '../src/interfaces/BackupManager';

// Mock all dependencies
jest.mock('../src/clients/Logger');
jest.mock('../src/clients/BackupManager');
jest.mock('../src/clients/CronScheduler');
jest.mock('../src/clients/DockerRuntime');
jest.mock('../src/clients/HealthchecksNotifier');

const SCHEDULED_CONFIG = join(__dirname, 'fixtures', 'config.yaml');
const ONCE_CONFIG = join(__dirname, 'fixtures', 'once.yaml');

function report(status: RunReport['status']): RunReport {
  return {
    runId: 'run-1',
    timestamp: '20240115_020000_UTC',
    startedAt: new Date('2024-01-15T02:00:00Z'),
    finishedAt: new Date('2024-01-15T02:01:00Z'),
    status,
    results: [],
  };
}

describe('BackupAgentApplication', () => {
  const executeRun = jest.mocked(BackupManager.prototype.executeRun);
  const validateConfiguration = jest.mocked(BackupManager.prototype.validateConfiguration);
  const schedulerStart = jest.mocked(CronScheduler.prototype.start);

  beforeEach(() => {
    jest.clearAllMocks();
    executeRun.mockResolvedValue(report('success'));
    validateConfiguration.mockResolvedValue(true);
  });

  describe('main', () => {
    it('should run once and exit 0 when the run succeeds', async () => {
      await expect(main([], { CONFIG_FILE_PATH: ONCE_CONFIG })).resolves.toBe(ExitCode.SUCCESS);

      expect(executeRun).toHaveBeenCalledTimes(1);
      expect(CronScheduler).not.toHaveBeenCalled();
    });

    it('should exit 1 when any database failed', async () => {
      executeRun.mockResolvedValue(report('failure'));

      await expect(main([], { CONFIG_FILE_PATH: ONCE_CONFIG })).resolves.toBe(ExitCode.RUN_FAILED);
    });

    it('should run once with --once even when a schedule is configured', async () => {
      await expect(main(['--once'], { CONFIG_FILE_PATH: SCHEDULED_CONFIG })).resolves.toBe(ExitCode.SUCCESS);

      expect(executeRun).toHaveBeenCalledTimes(1);
      expect(schedulerStart).not.toHaveBeenCalled();
    });

    it('should start the scheduler when a schedule is configured', async () => {
      const processOn = jest.spyOn(process, 'on').mockImplementation(() => process);

      await expect(main([], { CONFIG_FILE_PATH: SCHEDULED_CONFIG })).resolves.toBeNull();

      expect(CronScheduler).toHaveBeenCalledWith(
        { cronExpression: '0 2 * * *', timezone: 'America/New_York', runOnInit: false },
        expect.any(BackupManager),
        expect.anything()
      );
      expect(schedulerStart).toHaveBeenCalledTimes(1);
      expect(executeRun).not.toHaveBeenCalled();
      expect(processOn).toHaveBeenCalledWith('SIGTERM', expect.any(Function));

      processOn.mockRestore();
    });

    it('should exit 2 on a configuration error', async () => {
      await expect(
        main([], { CONFIG_FILE_PATH: join(__dirname, 'fixtures', 'missing.yaml') })
      ).resolves.toBe(ExitCode.CONFIGURATION_ERROR);

      expect(executeRun).not.toHaveBeenCalled();
    });

    it('should exit 3 when the container runtime is unreachable', async () => {
      validateConfiguration.mockResolvedValue(false);

      await expect(main([], { CONFIG_FILE_PATH: ONCE_CONFIG })).resolves.toBe(ExitCode.INITIALIZATION_ERROR);

      expect(executeRun).not.toHaveBeenCalled();
    });
  });

  describe('initialize', () => {
    it('should use the health check notifier when a URL is configured', async () => {
      await new BackupAgentApplication({ CONFIG_FILE_PATH: SCHEDULED_CONFIG }).initialize();

      expect(HealthchecksNotifier).toHaveBeenCalledWith('https://hc.example.test/ping/test-check', expect.anything());
      expect(NoopNotifier).not.toHaveBeenCalled();
    });

    it('should disable health pings without a URL', async () => {
      await new BackupAgentApplication({ CONFIG_FILE_PATH: ONCE_CONFIG }).initialize();

      expect(NoopNotifier).toHaveBeenCalledTimes(1);
      expect(HealthchecksNotifier).not.toHaveBeenCalled();
    });
  });

  describe('runOnce', () => {
    it('should refuse to run before initialization', async () => {
      await expect(new BackupAgentApplication({}).runOnce()).rejects.toBeInstanceOf(InitializationError);
    });
  });

  describe('shutdown', () => {
    it('should stop the scheduler and wait for the run in progress', async () => {
      jest.mocked(CronScheduler.prototype.isRunning).mockReturnValue(true);
      jest.mocked(CronScheduler.prototype.waitForIdle).mockResolvedValue(undefined);
      const app = new BackupAgentApplication({ CONFIG_FILE_PATH: SCHEDULED_CONFIG });
      await app.initialize();

      await app.shutdown();

      expect(CronScheduler.prototype.stop).toHaveBeenCalledTimes(1);
      expect(CronScheduler.prototype.waitForIdle).toHaveBeenCalledTimes(1);
    });
  });
});
