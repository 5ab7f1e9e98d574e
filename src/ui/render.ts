import { clampMessage } from './text';

export type RenderSection = { header?: string; body?: string };

/** Optional notice above the screen body; empty parts are left out. */
export const renderScreen = ({ header, body }: RenderSection): string =>
  clampMessage([header, body].filter((part): part is string => Boolean(part)).join('\n'));
