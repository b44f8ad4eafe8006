export type GameLogger = Pick<Console, 'debug' | 'info'>;

const noop = (): void => undefined;

export const silentLogger: GameLogger = {
  debug: noop,
  info: noop
};
