export interface CourseCode {
  prefix: string;
  number: string;
  /** Text following the code, usually the title. */
  rest: string;
}

const COURSE_CODE = /(?<![A-Za-z])([A-Za-z][A-Za-z&]{1,7})[\s_-]*(\d{2,4}[A-Za-z]{0,3})(?![\dA-Za-z])(?:\s*[-–—:.]?\s*(.*))?/;

/** Finds the first `PREFIX NUMBER` pair in a heading, link text or URL path such as `/accounting-acc/acc-124`. */
export function parseCourseCode(text: string): CourseCode | undefined {
  const match = text.match(COURSE_CODE);
  if (!match) {
    return undefined;
  }
  return {
    prefix: match[1].toUpperCase(),
    number: match[2].toUpperCase(),
    rest: (match[3] ?? "").trim(),
  };
}
