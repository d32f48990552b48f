import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { CONFIG_ENV_VAR, ConfigLoader, DEFAULT_TARGET_PATHS } from '../config/configLoader';

describe('ConfigLoader', () => {
  let tempDir: string;

  const validConfig = `
version = "1.2.3"
scanLimit = 5

[[targets]]
path = "vec-utils/Cargo.toml"

[[targets]]
path = "vec-utils-py/pyproject.toml"
line = 2

[logging]
level = "debug"
`;

  const writeConfig = (relativePath: string, content: string): string => {
    const configPath = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, content);
    return configPath;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-loader-test-'));
    delete process.env[CONFIG_ENV_VAR];
  });

  afterEach(() => {
    delete process.env[CONFIG_ENV_VAR];
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should fall back to the built-in configuration', () => {
      const config = ConfigLoader.loadConfig({}, tempDir);

      expect(config.version).toBe('0.2.5');
      expect(config.scanLimit).toBe(20);
      expect(config.logging.level).toBe('info');
      expect(config.targets.map(t => t.path)).toEqual([...DEFAULT_TARGET_PATHS]);
      expect(config.targets[0].resolvedPath).toBe(path.join(tempDir, 'vec-utils', 'Cargo.toml'));
      expect(config.targets[2].resolvedPath).toBe(path.join(tempDir, 'vec-utils-py', 'pyproject.toml'));
      expect(config.targets.every(t => t.line === undefined)).toBe(true);
    });

    it('should load version-sync.toml from the working directory', () => {
      writeConfig('version-sync.toml', validConfig);

      const config = ConfigLoader.loadConfig({}, tempDir);

      expect(config.version).toBe('1.2.3');
      expect(config.scanLimit).toBe(5);
      expect(config.logging.level).toBe('debug');
      expect(config.targets).toEqual([
        {
          path: 'vec-utils/Cargo.toml',
          resolvedPath: path.join(tempDir, 'vec-utils', 'Cargo.toml'),
        },
        {
          path: 'vec-utils-py/pyproject.toml',
          resolvedPath: path.join(tempDir, 'vec-utils-py', 'pyproject.toml'),
          line: 2,
        },
      ]);
    });

    it('should load config from CLI parameter and resolve targets against its directory', () => {
      writeConfig(path.join('conf', 'custom.toml'), validConfig);

      const config = ConfigLoader.loadConfig({ config: path.join('conf', 'custom.toml') }, tempDir);

      expect(config.targets[0].resolvedPath).toBe(path.join(tempDir, 'conf', 'vec-utils', 'Cargo.toml'));
    });

    it('should prefer the CLI parameter over the working directory file', () => {
      writeConfig('version-sync.toml', validConfig);
      writeConfig('other.toml', validConfig.replace('1.2.3', '9.9.9'));

      const config = ConfigLoader.loadConfig({ config: 'other.toml' }, tempDir);

      expect(config.version).toBe('9.9.9');
    });

    it('should throw error if CLI config file does not exist', () => {
      expect(() => ConfigLoader.loadConfig({ config: 'missing.toml' }, tempDir)).toThrow(
        'Config file specified via CLI not found: missing.toml'
      );
    });

    it('should load config from the environment variable', () => {
      const configPath = writeConfig('env.toml', validConfig.replace('1.2.3', '3.0.0'));
      process.env[CONFIG_ENV_VAR] = configPath;

      const config = ConfigLoader.loadConfig({}, tempDir);

      expect(config.version).toBe('3.0.0');
    });

    it('should throw error if environment config file does not exist', () => {
      process.env[CONFIG_ENV_VAR] = '/nonexistent/version-sync.toml';

      expect(() => ConfigLoader.loadConfig({}, tempDir)).toThrow(
        'Config file specified via VERSION_SYNC_CONFIG env var not found: /nonexistent/version-sync.toml'
      );
    });

    it('should default scanLimit and logging when omitted', () => {
      writeConfig('version-sync.toml', 'version = "1.0.0"\n\n[[targets]]\npath = "Cargo.toml"\n');

      const config = ConfigLoader.loadConfig({}, tempDir);

      expect(config.scanLimit).toBe(20);
      expect(config.logging.level).toBe('info');
    });
  });

  describe('validation', () => {
    const expectInvalid = (content: string, message: string): void => {
      const configPath = writeConfig('version-sync.toml', content);
      expect(() => ConfigLoader.loadConfig({}, tempDir)).toThrow(
        `Failed to parse config file ${configPath}: ${message}`
      );
    };

    it('should reject a missing version', () => {
      expectInvalid('[[targets]]\npath = "Cargo.toml"\n', 'Missing or invalid version. It must be a non-empty string.');
    });

    it('should reject a non-string version', () => {
      expectInvalid(
        'version = 1\n\n[[targets]]\npath = "Cargo.toml"\n',
        'Missing or invalid version. It must be a non-empty string.'
      );
    });

    it('should reject an empty targets array', () => {
      expectInvalid(
        'version = "1.0.0"\ntargets = []\n',
        'Missing or empty targets array in config. At least one target must be configured.'
      );
    });

    it('should reject a target without path', () => {
      expectInvalid('version = "1.0.0"\n\n[[targets]]\nline = 2\n', 'Target 1: Missing or invalid path');
    });

    it('should reject duplicate target paths', () => {
      expectInvalid(
        'version = "1.0.0"\n\n[[targets]]\npath = "Cargo.toml"\n\n[[targets]]\npath = "./Cargo.toml"\n',
        'Duplicate target path: "./Cargo.toml"'
      );
    });

    it('should reject a negative line index', () => {
      expectInvalid(
        'version = "1.0.0"\n\n[[targets]]\npath = "Cargo.toml"\nline = -1\n',
        'Target "Cargo.toml": line must be a non-negative integer'
      );
    });

    it('should reject a zero scanLimit', () => {
      expectInvalid(
        'version = "1.0.0"\nscanLimit = 0\n\n[[targets]]\npath = "Cargo.toml"\n',
        'Invalid scanLimit. It must be a positive integer.'
      );
    });

    it('should reject an unknown logging level', () => {
      expectInvalid(
        'version = "1.0.0"\n\n[[targets]]\npath = "Cargo.toml"\n\n[logging]\nlevel = "verbose"\n',
        'Invalid logging.level "verbose". Expected one of: debug, info, warn, error'
      );
    });

    it('should wrap TOML syntax errors', () => {
      const configPath = writeConfig('version-sync.toml', 'version = \n');
      expect(() => ConfigLoader.loadConfig({}, tempDir)).toThrow(`Failed to parse config file ${configPath}: `);
    });
  });

  describe('overrides', () => {
    it('should apply --set-version over the configured version', () => {
      writeConfig('version-sync.toml', validConfig);

      const config = ConfigLoader.loadConfig({ setVersion: '2.0.0' }, tempDir);

      expect(config.version).toBe('2.0.0');
    });

    it('should apply --set-version over the built-in version', () => {
      const config = ConfigLoader.loadConfig({ setVersion: '0.3.0' }, tempDir);
      expect(config.version).toBe('0.3.0');
    });

    it('should reject an empty --set-version', () => {
      expect(() => ConfigLoader.loadConfig({ setVersion: ' ' }, tempDir)).toThrow('--set-version must not be empty');
    });

    it('should apply --log-level', () => {
      const config = ConfigLoader.loadConfig({ logLevel: 'warn' }, tempDir);
      expect(config.logging.level).toBe('warn');
    });

    it('should reject an unknown --log-level', () => {
      expect(() => ConfigLoader.loadConfig({ logLevel: 'trace' }, tempDir)).toThrow(
        'Invalid --log-level "trace". Expected one of: debug, info, warn, error'
      );
    });
  });
});
