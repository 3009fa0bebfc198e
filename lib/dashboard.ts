/**
 * The fixed probe set and where each probe sits on the grid
 */
import type { DashboardConfig } from './config';
import type { ProbeDeps } from './deps';
import type { Color } from './drawables';
import { LayoutManager, evenSpans, type LayoutSpec } from './layout';
import { logger } from './logger';
import {
  AudioProbe,
  BatteryProbe,
  CpuProbe,
  DiskProbe,
  FeedProbe,
  GitProbe,
  HeaderProbe,
  HostInfoProbe,
  NetworkProbe,
  WeatherProbe,
  parseFeedAccount,
} from './probes';
import { ProbeRegistry } from './registry';

const FEED_COLORS: ReadonlyArray<Color> = ['yellow', 'cyan', 'magenta', 'white'];

export interface Dashboard {
  registry: ProbeRegistry;
  layout: LayoutManager;
}

export function createLayoutSpec(feedProbes: ReadonlyArray<string>): LayoutSpec {
  const rows: LayoutSpec['rows'] = [
    {
      columns: [
        { span: 6, probes: ['host-info', 'battery', 'audio', 'network'] },
        { span: 6, probes: ['cpu'] },
      ],
    },
    {
      columns: [
        { span: 6, probes: ['disk'] },
        { span: 6, probes: ['weather'] },
      ],
    },
    {
      columns: [{ span: 12, probes: ['git'] }],
    },
  ];

  if (feedProbes.length > 0) {
    const spans = evenSpans(feedProbes.length);
    // More accounts than grid units share the last column
    const columns = spans.map((span, index) => ({
      span,
      probes: index === spans.length - 1 ? feedProbes.slice(index) : feedProbes.slice(index, index + 1),
    }));
    rows.push({ columns });
  }

  return { chrome: 'header', rows };
}

/**
 * Register every probe in display order and validate the layout against them
 */
export function buildDashboard(config: DashboardConfig, deps: ProbeDeps): Dashboard {
  const registry = new ProbeRegistry();

  registry
    .register(new HeaderProbe(deps.commands))
    .register(new HostInfoProbe(deps.fs, deps.commands))
    .register(new NetworkProbe(deps.network))
    .register(new BatteryProbe(deps.commands, config.intervals.battery))
    .register(new AudioProbe(deps.audio))
    .register(new DiskProbe(
      deps.fs,
      { fsTypes: config.excludedFsTypes, mountPoints: config.excludedMountPoints },
      config.intervals.disk,
    ))
    .register(new CpuProbe(deps.fs))
    .register(new GitProbe(
      deps.walker,
      deps.fs,
      deps.commands,
      config.repoSearch,
      config.home,
      config.intervals.gitDiscovery,
      config.intervals.gitStatus,
    ));

  const feedProbes: Array<string> = [];
  const seen = new Set<string>();
  for (const raw of config.feedAccounts) {
    const account = parseFeedAccount(raw);
    if (account === null) {
      logger.warn({ account: raw }, 'Ignoring feed account, expected user@instance');
      continue;
    }
    if (seen.has(account.handle)) continue;
    seen.add(account.handle);

    const color = FEED_COLORS[feedProbes.length % FEED_COLORS.length] ?? 'white';
    const probe = new FeedProbe(deps.http, account, color, config.intervals.feed);
    registry.register(probe);
    feedProbes.push(probe.name);
  }

  registry.register(new WeatherProbe(deps.http, config.weatherLocation, config.intervals.weather));

  const layout = new LayoutManager(createLayoutSpec(feedProbes), registry);
  return { registry, layout };
}
