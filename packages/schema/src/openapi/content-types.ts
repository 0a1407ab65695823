import { isFileType } from '../fields';
import type { Shape } from '../shape';
import { describeShape } from '../tags';
import { ContentType } from './types';

/**
 * Request content types a shape accepts, most specific first.
 *
 * A file field forces multipart. Otherwise `form` fields mean urlencoded
 * (with JSON as an alternative when `json` fields exist too), and anything
 * else is JSON.
 */
export function contentTypesFor(shape: Shape<unknown>): ContentType[] {
  const descriptors = describeShape(shape);

  if (descriptors.some((d) => isFileType(d.type))) {
    return [ContentType.Multipart];
  }

  const hasForm = descriptors.some((d) => d.sources.form !== undefined);
  const hasBody = descriptors.some((d) => d.sources.body !== undefined);

  if (hasForm) {
    return hasBody
      ? [ContentType.Form, ContentType.Json]
      : [ContentType.Form];
  }

  return [ContentType.Json];
}
