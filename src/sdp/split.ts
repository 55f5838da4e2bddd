import { SdpArityError } from './SdpParseError';

/**
 * Splits at the first occurrence of `separator`. The second part keeps any
 * further separators untouched.
 */
export const splitTwo = (text: string, separator: string, message: string): [string, string] => {
  const index = text.indexOf(separator);
  if (index === -1) {
    throw new SdpArityError(message, text, 2, separator);
  }
  return [text.slice(0, index), text.slice(index + separator.length)];
};

export const splitThree = (text: string, separator: string, message: string): [string, string, string] => {
  const first = text.indexOf(separator);
  const second = first === -1 ? -1 : text.indexOf(separator, first + separator.length);
  if (second === -1) {
    throw new SdpArityError(message, text, 3, separator);
  }
  return [
    text.slice(0, first),
    text.slice(first + separator.length, second),
    text.slice(second + separator.length),
  ];
};
