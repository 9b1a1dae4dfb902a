// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createToolRegistry } from '../tool/registry.ts';
import { compileRestricted } from './compile.ts';
import { createSandboxSession } from './session.ts';

async function run(source: string): Promise<string | null> {
  const compiled = compileRestricted(source);
  if (!compiled.program) {
    throw new Error(compiled.errors.join('\n'));
  }
  const session = createSandboxSession(createToolRegistry([]));
  const result = await session.run(compiled.program);
  return result.output;
}

describe('builtins', () => {
  it('should sort and reduce', async () => {
    expect(await run('print(sorted([3, 1, 2], reverse=True), min([4, 2, 8]), max("abc"), sum(range(5)))\n')).toBe(
      '[3, 2, 1] 2 c 10\n',
    );
  });

  it('should sort with a key function', async () => {
    expect(await run('print(sorted(["bb", "a", "ccc"], key=len), max([1, -5, 3], key=abs))\n')).toBe(
      "['a', 'bb', 'ccc'] -5\n",
    );
  });

  it('should round half to even', async () => {
    expect(await run('print(round(2.5), round(3.5), round(2.675, 2))\n')).toBe('2 4 2.67\n');
  });

  it('should round exact ties to the even digit', async () => {
    expect(await run('print(round(0.125, 2), round(0.375, 2), round(-2.5), round(1250, -2))\n')).toBe(
      '0.12 0.38 -2 1200\n',
    );
  });

  it('should convert between types', async () => {
    expect(await run('print(int("ff", 16), int(" 42 "), float("1.5"), str(None), repr("a"), bool([]))\n')).toBe(
      "255 42 1.5 None 'a' False\n",
    );
  });

  it('should enumerate and zip eagerly', async () => {
    expect(await run('print(list(enumerate("ab", 1)), zip([1, 2, 3], "xy"))\n')).toBe(
      "[(1, 'a'), (2, 'b')] [(1, 'x'), (2, 'y')]\n",
    );
  });

  it('should honour print separators', async () => {
    expect(await run('print(1, 2, sep="-", end="!")\n')).toBe('1-2!');
  });

  it('should reject bad arguments', async () => {
    await expect(run('len(5)\n')).rejects.toThrow("object of type 'int' has no len()");
    await expect(run('len()\n')).rejects.toThrow('len() takes exactly one argument (0 given)');
    await expect(run('int("abc")\n')).rejects.toThrow("invalid literal for int() with base 10: 'abc'");
    await expect(run('float("abc")\n')).rejects.toThrow("could not convert string to float: 'abc'");
    await expect(run('max([])\n')).rejects.toThrow('max() arg is an empty sequence');
    await expect(run('5()\n')).rejects.toThrow("'int' object is not callable");
  });
});

describe('methods', () => {
  it('should call string methods', async () => {
    const source = 'print("a,b,,c".split(","), "  hi  ".strip(), "hello".replace("l", "L", 1), "{}-{x}".format(1, x=2))\n';

    expect(await run(source)).toBe("['a', 'b', '', 'c'] hi heLlo 1-2\n");
  });

  it('should mutate lists in place', async () => {
    const source = 'xs = [3, 1, 2]\nxs.sort()\nxs.append(4)\nfirst = xs.pop(0)\nprint(first, xs)\n';

    expect(await run(source)).toBe('1 [2, 3, 4]\n');
  });

  it('should read and update dicts', async () => {
    const source = 'd = {"a": 1}\nd.update({"b": 2})\nprint(d.items())\nprint(d.pop("a"), d, d.setdefault("c", 3))\n';

    expect(await run(source)).toBe("[('a', 1), ('b', 2)]\n1 {'b': 2, 'c': 3} 3\n");
  });

  it('should find substrings by code point', async () => {
    const source = 's = "\\U0001F600ab"\nprint(s.find("a"), s[s.find("a")], s.index("b"), s.find("b", -1))\n';

    expect(await run(source)).toBe('1 a 2 2\n');
  });

  it('should not find anything past the end of a string', async () => {
    expect(await run('print("abc".find("", 10), "abc".find("", 3), "abc".find("c", 5))\n')).toBe('-1 3 -1\n');
    await expect(run('"abc".index("", 4)\n')).rejects.toThrow('substring not found');
  });

  it('should report method errors', async () => {
    await expect(run('[].pop()\n')).rejects.toThrow('pop from empty list');
    await expect(run('[1].remove(2)\n')).rejects.toThrow('list.remove(x): x not in list');
    await expect(run('"-".join([1])\n')).rejects.toThrow('sequence item 0: expected str instance, int found');
    await expect(run('[1].nope()\n')).rejects.toThrow("'list' object has no attribute 'nope'");
  });
});
