import { RegistryError } from '../errors.js';
import type { ApplicationDescriptor } from '../types.js';
import type { InstallHook } from './hooks.js';

export interface RegisteredApplication extends Readonly<ApplicationDescriptor> {
  readonly packageName: string;
  readonly installer?: InstallHook;
  readonly postInstallHooks: readonly InstallHook[];
}

export type Registry = readonly RegisteredApplication[];

export const DEFAULT_APPLICATIONS: readonly ApplicationDescriptor[] = [
  {
    id: 'fira-code',
    name: 'Fira Code font',
    method: 'custom',
    installHook: 'fira-code-font',
    locations: ['~/Library/Fonts/ttf/FiraCode-Regular.ttf'],
  },
  {
    id: 'kitty',
    name: 'Kitty',
    method: 'homebrew',
    package: 'kitty',
    locations: ['/Applications/kitty.app', '/opt/homebrew/bin/kitty'],
    postInstall: ['kitty-icon'],
  },
  { id: 'vim', name: 'Vim', method: 'homebrew', package: 'vim' },
  { id: 'nvim', name: 'Neovim', method: 'homebrew', package: 'neovim' },
  {
    id: 'zsh',
    name: 'Zsh',
    method: 'homebrew',
    package: 'zsh',
    locations: ['/bin/zsh', '/usr/local/bin/zsh', '/opt/homebrew/bin/zsh'],
  },
  {
    id: 'emacs',
    name: 'Emacs',
    method: 'homebrew',
    package: 'emacs',
    cask: true,
    locations: ['/Applications/Emacs.app'],
  },
  { id: 'tree', name: 'Tree', method: 'homebrew', package: 'tree' },
];

/**
 * Resolves hook ids to functions up front so a typo in the table fails at
 * startup instead of halfway through an install run.
 */
export function createRegistry(
  descriptors: readonly ApplicationDescriptor[],
  hooks: Readonly<Record<string, InstallHook>>,
): Registry {
  const seen = new Set<string>();

  const lookup = (appId: string, hookId: string): InstallHook => {
    const hook = Object.hasOwn(hooks, hookId) ? hooks[hookId] : undefined;
    if (!hook) {
      throw new RegistryError(`Unknown hook "${hookId}" referenced by application "${appId}"`);
    }
    return hook;
  };

  const apps = descriptors.map((descriptor): RegisteredApplication => {
    if (seen.has(descriptor.id)) {
      throw new RegistryError(`Duplicate application id "${descriptor.id}"`);
    }
    seen.add(descriptor.id);

    if (descriptor.method === 'custom' && !descriptor.installHook) {
      throw new RegistryError(`Application "${descriptor.id}" uses the custom method but names no install hook`);
    }

    return Object.freeze({
      ...descriptor,
      locations: descriptor.locations ? Object.freeze([...descriptor.locations]) : undefined,
      postInstall: descriptor.postInstall ? Object.freeze([...descriptor.postInstall]) : undefined,
      packageName: descriptor.package ?? descriptor.id,
      installer: descriptor.installHook ? lookup(descriptor.id, descriptor.installHook) : undefined,
      postInstallHooks: Object.freeze((descriptor.postInstall ?? []).map(id => lookup(descriptor.id, id))),
    });
  });

  return Object.freeze(apps);
}
