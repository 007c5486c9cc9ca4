import Table from 'cli-table3';

/**
 * Plain table without colors, so reports read the same in a terminal,
 * a CI log or a file
 */
const defaultStyle: Table.TableConstructorOptions = {
  style: {
    head: [],
    border: [],
  },
};

export default class ReportTable extends Table {
  constructor(opts: Table.TableConstructorOptions) {
    super({ ...defaultStyle, ...opts });
  }
}
