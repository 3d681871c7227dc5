import { Row } from '../row';
import RowIterator from '../iterator/type';

export default async function drainIterator(
  iterable: RowIterator, limit?: number,
): Promise<Row[]> {
  let output: Row[] = [];
  let hasNext = true;
  do {
    let result = await iterable.next(limit);
    hasNext = !result.done;
    if (!result.done) {
      for (let i = 0; i < result.value.length; ++i) {
        output.push(result.value[i]);
      }
    }
  } while (hasNext);
  return output;
}
