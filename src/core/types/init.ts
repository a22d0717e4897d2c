export interface InitCommandOptions {
  yes?: boolean;
  fresh?: boolean;
  format?: string;
}
