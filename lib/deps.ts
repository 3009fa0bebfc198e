/**
 * Dependency interfaces for testing and dependency injection
 */

import { readFile, realpath, statfs } from 'node:fs/promises';
import { networkInterfaces, type NetworkInterfaceInfo } from 'node:os';

import { httpGet, type HttpResult } from './sources/http';
import { PactlAudioBackend, type AudioBackend } from './sources/pactl';
import { runCommand, type CommandOptions, type CommandResult } from './sources/command';
import { walkForMarker } from './sources/walker';

export type { HttpResult, CommandOptions, CommandResult, AudioBackend };

// ============================================================================
// HTTP Client Interface
// ============================================================================

export interface HttpClient {
  get(url: string, headers?: Record<string, string>): Promise<HttpResult>;
}

export class GotHttpClient implements HttpClient {
  async get(url: string, headers: Record<string, string> = {}): Promise<HttpResult> {
    return await httpGet(url, headers);
  }
}

// ============================================================================
// Command Runner Interface
// ============================================================================

export interface CommandRunner {
  run(command: string, args: Array<string>, options?: CommandOptions): Promise<CommandResult>;
}

export class ExecCommandRunner implements CommandRunner {
  async run(command: string, args: Array<string>, options: CommandOptions = {}): Promise<CommandResult> {
    return await runCommand(command, args, options);
  }
}

// ============================================================================
// File System Interface
// ============================================================================

export interface FsUsage {
  bsize: number;
  blocks: number;
  bavail: number;
  files: number;
  ffree: number;
}

export interface FileSystem {
  readFile(path: string): Promise<string>;
  statfs(path: string): Promise<FsUsage>;
  realpath(path: string): Promise<string>;
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    return await readFile(path, 'utf-8');
  }

  async statfs(path: string): Promise<FsUsage> {
    const stats = await statfs(path);
    return {
      bsize: stats.bsize,
      blocks: stats.blocks,
      bavail: stats.bavail,
      files: stats.files,
      ffree: stats.ffree,
    };
  }

  async realpath(path: string): Promise<string> {
    return await realpath(path);
  }
}

// ============================================================================
// Directory Walker Interface
// ============================================================================

export interface DirectoryWalker {
  walk(root: string, maxDepth: number, marker: string): Promise<Array<string>>;
}

export class NodeDirectoryWalker implements DirectoryWalker {
  async walk(root: string, maxDepth: number, marker: string): Promise<Array<string>> {
    return await walkForMarker(root, maxDepth, marker);
  }
}

// ============================================================================
// Network Interfaces
// ============================================================================

export type InterfaceTable = Record<string, Array<NetworkInterfaceInfo> | undefined>;

export interface NetworkSource {
  interfaces(): InterfaceTable;
}

export class OsNetworkSource implements NetworkSource {
  interfaces(): InterfaceTable {
    return networkInterfaces();
  }
}

// ============================================================================
// Default Instances
// ============================================================================

export interface ProbeDeps {
  http: HttpClient;
  commands: CommandRunner;
  fs: FileSystem;
  walker: DirectoryWalker;
  network: NetworkSource;
  audio: AudioBackend;
}

export function createDefaultDeps(): ProbeDeps {
  const commands = new ExecCommandRunner();
  return {
    http: new GotHttpClient(),
    commands,
    fs: new NodeFileSystem(),
    walker: new NodeDirectoryWalker(),
    network: new OsNetworkSource(),
    audio: new PactlAudioBackend(commands),
  };
}
