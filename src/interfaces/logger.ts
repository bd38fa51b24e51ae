/**
 * Console verbosity levels. Higher levels include everything below them.
 * Normal shows warnings and errors; Info adds progress notes and decisions.
 */
export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Info = 2,
  Verbose = 3,
}
