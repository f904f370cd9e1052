import { describeLoadError, parseLevel, type Level } from './level';

export function levelFrom(text: string): Level {
  const res = parseLevel(text);
  if (!res.ok) throw new Error(describeLoadError(res.error));
  return res.level;
}
