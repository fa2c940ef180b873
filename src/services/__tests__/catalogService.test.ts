import { CatalogService } from '../catalogService';
import { DEFAULT_COMPILED_ROOM_RULES } from '../roomExtractor';

function row(code: string, name: string, teacher: string, department: string, credits: string, info: string) {
  return {
    '课程号': code,
    '课程名': name,
    '教师': teacher,
    '班号': '1',
    '开课单位': department,
    '学分': credits,
    '上课考试信息': info,
  };
}

const rows = [
  row('A001', '数据结构', '甲', '信息科学技术学院', '3', '1~16周 每周 周三 3~4节 理教107'),
  row('C001', '线性代数', '丙', '数学科学学院', '4', '1~16周 每周 周三 1~2节 三教101'),
  row('B001', '算法设计', '乙', '信息科学技术学院', '3', '5~5周 每周 周三 4~5节 二教205'),
];

describe('CatalogService', () => {
  let service: CatalogService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    service = new CatalogService({ rules: DEFAULT_COMPILED_ROOM_RULES, maxRowsPerLoad: 3, defaultCreditLimit: 5 });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should refuse queries before a catalog is loaded', () => {
    expect(service.isLoaded()).toBe(false);
    expect(() => service.getDepartments()).toThrow('No course list loaded yet');
  });

  it('should refuse loads above the row limit', () => {
    expect(() => service.load([...rows, rows[0]])).toThrow('Too many rows: 4 (max 3)');
  });

  it('should summarize a load', () => {
    const summary = service.load(rows);

    expect(summary).toMatchObject({
      totalRows: 3,
      courses: 3,
      uniqueKeys: 3,
      keyCollisions: [],
      emptyRoomRows: [],
      meetingParseWarnings: [],
      globalWarnings: [],
    });
    expect(service.isLoaded()).toBe(true);
  });

  it('should list courses by department, name, teacher and class', () => {
    service.load(rows);

    expect(service.getCourses().map(c => c.courseCode)).toEqual(['A001', 'B001', 'C001']);
    expect(service.getCourses('数学科学学院').map(c => c.courseCode)).toEqual(['C001']);
    expect(service.getCourses(undefined, '乙').map(c => c.courseCode)).toEqual(['B001']);
    expect(service.getDepartments()).toEqual(['信息科学技术学院', '数学科学学院']);
  });

  it('should return occupied cells of a course', () => {
    service.load(rows);

    expect(service.getOccupiedCells({ courseCode: 'A001', classNo: '1' })).toHaveLength(32);
    expect(() => service.getOccupiedCells({ courseCode: 'Z999', classNo: '1' })).toThrow('Course (Z999, 1) not found');
  });

  it('should apply the default credit limit', () => {
    service.load(rows);

    const result = service.checkAdd([{ courseCode: 'A001', classNo: '1' }], [{ courseCode: 'C001', classNo: '1' }]);
    expect(result).toMatchObject({ ok: false, reason: 'CREDIT_EXCEEDED', current: 3, added: 4, limit: 5 });
  });

  it('should build the timetable of a week', () => {
    service.load(rows);

    const cells = service.getTimetable([{ courseCode: 'C001', classNo: '1' }], 1);
    expect(cells.map(cell => [cell.weekday, cell.period])).toEqual([
      [3, 1],
      [3, 2],
    ]);
    expect(() => service.getTimetable([{ courseCode: 'Z999', classNo: '1' }], 1)).toThrow('Unknown course(s): (Z999, 1)');
  });
});
