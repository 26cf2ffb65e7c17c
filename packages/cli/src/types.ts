export type ExitCode = 0 | 1 | 2 | 3 | 4 | 5 | 130;
