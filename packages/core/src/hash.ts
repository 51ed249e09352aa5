import { md5 } from "js-md5";

/**
 * Content digest of an encoded document, used to compare export runs.
 */
export const digestText = (text: string): string => {
  return md5(text);
};
