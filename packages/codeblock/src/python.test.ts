import { describe, it, expect } from "vitest";
import { isPythonCode, isReplCode } from "./python.js";

describe("isPythonCode", () => {
  describe("source", () => {
    it("accepts a single call", () => {
      expect(isPythonCode("print('hi')")).toBe(true);
    });

    it("accepts a function definition", () => {
      const code = 'def greet(name):\n    return f"Hello {name}"';
      expect(isPythonCode(code)).toBe(true);
    });

    it("accepts assignments", () => {
      expect(isPythonCode("x = 1\ny = x + 2")).toBe(true);
      expect(isPythonCode("count: int = 5")).toBe(true);
      expect(isPythonCode("total += 1")).toBe(true);
    });

    it("accepts loops and conditionals", () => {
      expect(isPythonCode("for i in range(3):\n    print(i)")).toBe(true);
      expect(isPythonCode("if __name__ == '__main__':\n    main()\nelse:\n    pass")).toBe(true);
    });

    it("accepts imports", () => {
      expect(isPythonCode("import os\nprint(os.getcwd())")).toBe(true);
      expect(isPythonCode("from . import utils")).toBe(true);
    });

    it("accepts decorators and async code", () => {
      expect(isPythonCode("@app.route('/')\ndef index():\n    pass")).toBe(true);
      expect(isPythonCode("async def main():\n    await run()")).toBe(true);
    });

    it("accepts brackets spanning lines", () => {
      expect(isPythonCode("values = [\n    1,\n    2,\n]")).toBe(true);
    });

    it("accepts triple-quoted strings spanning lines", () => {
      expect(isPythonCode("doc = '''first\nsecond'''")).toBe(true);
    });

    it("accepts several statements on one line", () => {
      expect(isPythonCode("print('a'); print('b')")).toBe(true);
    });

    it("accepts calls on attributes even with a space before the parenthesis", () => {
      expect(isPythonCode("main()")).toBe(true);
      expect(isPythonCode("os.getcwd()")).toBe(true);
      expect(isPythonCode("os.getcwd ()")).toBe(true);
    });

    it("accepts indented lines after the first", () => {
      expect(isPythonCode("\nwhile True:\n    tick()")).toBe(true);
    });

    it("accepts match statements", () => {
      expect(isPythonCode("match command:\n    case 'go':\n        pass")).toBe(true);
    });

    it("ignores comments and null bytes", () => {
      expect(isPythonCode("# setup\nx = 1  # one")).toBe(true);
      expect(isPythonCode("\0print(1)")).toBe(true);
    });
  });

  describe("not source", () => {
    it("rejects prose", () => {
      expect(isPythonCode("Hello world")).toBe(false);
      expect(isPythonCode("Can anyone help me with my homework")).toBe(false);
    });

    it("rejects prose with a parenthetical remark", () => {
      for (const text of ["Thanks (again)", "Hello (everyone)", "lol (jk)", "Help (urgent)", "yes (probably)"]) {
        expect(isPythonCode(text)).toBe(false);
      }
    });

    it("rejects text whose first line is indented", () => {
      expect(isPythonCode("  x = 1")).toBe(false);
      expect(isPythonCode("\n\tprint(1)")).toBe(false);
      expect(isPythonCode("# note\n    x = 1")).toBe(false);
    });

    it("rejects prose with apostrophes or question marks", () => {
      expect(isPythonCode("I don't know why this fails")).toBe(false);
      expect(isPythonCode("Is this right?")).toBe(false);
    });

    it("rejects a column of bare words", () => {
      expect(isPythonCode("hello\nworld")).toBe(false);
    });

    it("rejects empty text and lone comments", () => {
      expect(isPythonCode("")).toBe(false);
      expect(isPythonCode("# just a comment")).toBe(false);
    });

    it("rejects a block header without a colon", () => {
      expect(isPythonCode("if x\n    print(x)")).toBe(false);
    });

    it("rejects dangling operators", () => {
      expect(isPythonCode("x =")).toBe(false);
      expect(isPythonCode("total = 1 +")).toBe(false);
    });

    it("rejects unbalanced brackets", () => {
      expect(isPythonCode("d = {'a': 1]")).toBe(false);
      expect(isPythonCode("print(1")).toBe(false);
    });

    it("rejects Python 2 print statements", () => {
      expect(isPythonCode("print 'hello'")).toBe(false);
    });

    it("rejects numbers run into names", () => {
      expect(isPythonCode("x = 1abc")).toBe(false);
    });

    it("rejects code in other languages with unknown symbols", () => {
      expect(isPythonCode("echo $HOME")).toBe(false);
      expect(isPythonCode("const x = 1;")).toBe(false);
    });
  });
});

describe("isReplCode", () => {
  const session = ">>> a = 1\n>>> b = 2\n>>> a + b\n3";

  it("detects a session with enough prompts", () => {
    expect(isReplCode(session)).toBe(true);
  });

  it("counts continuation prompts", () => {
    expect(isReplCode(">>> for i in x:\n...     print(i)\n... \n>>> ")).toBe(true);
  });

  it("needs the threshold number of prompt lines", () => {
    expect(isReplCode(">>> a = 1\n>>> a")).toBe(false);
    expect(isReplCode(">>> a = 1\n>>> a", 2)).toBe(true);
  });

  it("requires a space after the prompt", () => {
    expect(isReplCode(">>>a\n>>>b\n>>>c")).toBe(false);
  });
});
