import {
  ToolkitError,
  type ToolkitConfig,
  type ToolkitConfigOverrides,
} from '../types/index.js';

const WORLD_WRITABLE = 0o002;
const MAX_ESCALATION_STEPS = 2;

/**
 * Apache deny-all block, covering both mod_access_compat and the older mod_access.
 */
export const DENY_ALL_MARKER_CONTENT =
  '<Files "*">\n' +
  '<IfModule mod_access.c>\n' +
  'Deny from all\n' +
  '</IfModule>\n' +
  '<IfModule !mod_access_compat>\n' +
  '<IfModule mod_authz_host.c>\n' +
  'Deny from all\n' +
  '</IfModule>\n' +
  '</IfModule>\n' +
  '<IfModule mod_access_compat>\n' +
  'Deny from all\n' +
  '</IfModule>\n' +
  '</Files>\n';

export const DEFAULT_EXCLUDED_EXTENSIONS: readonly string[] = Object.freeze(['php', 'tpl', 'twig']);

function describeMode(mode: number): string {
  return `0${mode.toString(8)}`;
}

function assertMode(name: string, mode: number): void {
  if (!Number.isInteger(mode) || mode < 0 || mode > 0o7777) {
    throw new ToolkitError('INVALID_CONFIG', `${name} must be a file mode between 0 and 07777`);
  }
  if (mode & WORLD_WRITABLE) {
    throw new ToolkitError('INVALID_CONFIG', `${name} must not be world-writable (got ${describeMode(mode)})`);
  }
}

function validate(config: ToolkitConfig): void {
  assertMode('directoryMode', config.directoryMode);
  assertMode('copyRetryMode', config.copyRetryMode);

  if (config.permissionEscalationModes.length > MAX_ESCALATION_STEPS) {
    throw new ToolkitError(
      'INVALID_CONFIG',
      `permissionEscalationModes allows at most ${MAX_ESCALATION_STEPS} steps`
    );
  }
  config.permissionEscalationModes.forEach((mode, index) =>
    assertMode(`permissionEscalationModes[${index}]`, mode)
  );

  const { filename } = config.accessMarker;
  if (!filename || filename.includes('/')) {
    throw new ToolkitError('INVALID_CONFIG', 'accessMarker.filename must be a plain file name');
  }

  for (const extension of config.excludedExtensions) {
    if (!extension || extension.startsWith('.')) {
      throw new ToolkitError(
        'INVALID_CONFIG',
        `excludedExtensions entries are written without a leading dot (got "${extension}")`
      );
    }
  }

  if (config.networkFilesystemTypes.length === 0) {
    throw new ToolkitError('INVALID_CONFIG', 'networkFilesystemTypes must name at least one type');
  }
  for (const type of config.networkFilesystemTypes) {
    if (!/^[a-z0-9._-]+$/i.test(type)) {
      throw new ToolkitError('INVALID_CONFIG', `Invalid filesystem type: ${type}`);
    }
  }
}

/**
 * Build the immutable configuration shared by every component.
 * Overrides replace defaults key by key; `accessMarker` is merged field by field.
 */
export function createToolkitConfig(overrides: ToolkitConfigOverrides = {}): ToolkitConfig {
  const config: ToolkitConfig = {
    rootPath: (overrides.rootPath ?? process.cwd()).replace(/(.)\/+$/, '$1'),
    excludedExtensions: Object.freeze([...(overrides.excludedExtensions ?? DEFAULT_EXCLUDED_EXTENSIONS)]),
    accessMarker: Object.freeze({
      filename: overrides.accessMarker?.filename ?? '.htaccess',
      content: overrides.accessMarker?.content ?? DENY_ALL_MARKER_CONTENT,
    }),
    directoryMode: overrides.directoryMode ?? 0o755,
    permissionEscalationModes: Object.freeze([...(overrides.permissionEscalationModes ?? [0o755, 0o775])]),
    copyRetryMode: overrides.copyRetryMode ?? 0o755,
    networkFilesystemTypes: Object.freeze([...(overrides.networkFilesystemTypes ?? ['nfs'])]),
  };

  validate(config);
  return Object.freeze(config);
}
