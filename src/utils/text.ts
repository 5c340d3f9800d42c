export const truncate = (text: string, max: number): string =>
  max <= 0 ? '' : text.length > max ? text.slice(0, max) : text;

/** Column at which `text` starts when centred in `width` cells. */
export const centerColumn = (width: number, text: string): number =>
  Math.max(0, Math.floor((width - text.length) / 2));
