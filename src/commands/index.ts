export * from './context';
export { install } from './install';
export type { InstallOptions } from './install';
export { migrate } from './migrate';
export type { MigrateOptions } from './migrate';
export { up, down } from './up-down';
export type { UpOptions } from './up-down';
export { discover } from './discover';
export type { DiscoverOptions } from './discover';
export { status } from './status';
export { addController, CONTROLLER_IMAGE } from './add-controller';
export type { AddControllerOptions } from './add-controller';
export { enableIpv6, withIpv6 } from './enable-ipv6';
export type { EnableIpv6Options, DaemonConfig } from './enable-ipv6';
export { convergeStack, printReport } from './converge';
export { isStackDirectory, requireStackDirectory, withStackLock } from './stack-directory';
export { init, prepareStackDirectory } from './init';
export type { InitOptions } from './init';
export { flash, particle, wifi } from './flasher';
export type { FlasherOptions, ParticleOptions } from './flasher';
