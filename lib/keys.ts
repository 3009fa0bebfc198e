import { StartupError } from './errors';

export interface KeyPress {
  input: string;
  ctrl: boolean;
  meta: boolean;
  escape: boolean;
}

export interface KeyBinding {
  source: string;
  input: string;
  ctrl: boolean;
  meta: boolean;
  escape: boolean;
}

const MODIFIED_KEY_REGEX = /^([CM])-(.)$/;

/**
 * Binding syntax: "q", "C-c" (ctrl), "M-x" (meta), "escape"
 */
export function parseKeyBinding(source: string): KeyBinding {
  const trimmed = source.trim();

  if (trimmed.toLowerCase() === 'escape') {
    return { source: trimmed, input: '', ctrl: false, meta: false, escape: true };
  }

  const modified = MODIFIED_KEY_REGEX.exec(trimmed);
  if (modified !== null) {
    const [, modifier, key = ''] = modified;
    return {
      source: trimmed,
      input: key.toLowerCase(),
      ctrl: modifier === 'C',
      meta: modifier === 'M',
      escape: false,
    };
  }

  if ([...trimmed].length === 1) {
    return { source: trimmed, input: trimmed, ctrl: false, meta: false, escape: false };
  }

  throw new StartupError(`Invalid key binding '${source}'`);
}

export function matchesBinding(binding: KeyBinding, key: KeyPress) {
  if (binding.escape) return key.escape;
  if (binding.ctrl !== key.ctrl || binding.meta !== key.meta) return false;
  const input = binding.ctrl || binding.meta ? key.input.toLowerCase() : key.input;
  return input === binding.input;
}
