/**
 * Barrel export for the concrete probes
 */

export { HeaderProbe, osIdentity } from './header';
export type { HeaderState, HostIdentity } from './header';

export { HostInfoProbe, kerberosLabel } from './host-info';
export type { HostInfoState, KerberosStatus } from './host-info';

export { NetworkProbe } from './network';
export type { NetworkState, InterfaceAddress } from './network';

export { BatteryProbe, parseBatteryOutput } from './battery';
export type { BatteryState, BatteryReading } from './battery';

export { AudioProbe } from './audio';
export type { AudioState } from './audio';

export { DiskProbe, selectMounts, computeUsage, diskGauge } from './disk';
export type { DiskState, DiskEntry, DiskFilter } from './disk';

export { CpuProbe, computeUtilization, cpuTitle } from './cpu';
export type { CpuState } from './cpu';

export { GitProbe, parseGitStatus, discoverRepositories, homeRelative } from './git';
export type { GitState, GitStatus, RepoRecord } from './git';

export { FeedProbe, parseFeedAccount, feedUrl, firstItemText, NO_DATA } from './feed';
export type { FeedAccount, FeedState } from './feed';

export { WeatherProbe, parseWeather, weatherUrl } from './weather';
export type { WeatherState, WeatherReport } from './weather';

export { UNSUPPORTED_LABEL, UNSUPPORTED_STYLE } from './common';
