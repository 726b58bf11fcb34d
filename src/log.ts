export type LogSink = (line: string) => void;

export const silentSink: LogSink = () => {};

export const consoleSink: LogSink = (line) => {
  // eslint-disable-next-line no-console
  console.log(line);
};
