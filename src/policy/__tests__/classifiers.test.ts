import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { Platform } from '../../config/schema.js';
import {
	destructiveRootClassifier,
	findContainmentViolation,
	pathContainmentClassifier,
	platformCompatClassifier,
	syntaxClassifier,
	systemFileClassifier,
} from '../classifiers/index.js';
import { parseCommand } from '../shell-tokens.js';
import type { ClassifierContext } from '../types.js';

let root: string;
let home: string;
let outside: string;

beforeAll(() => {
	root = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-classifiers-')));
	home = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-home-')));
	outside = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-outside-')));
	mkdirSync(join(root, 'sub'));
	symlinkSync(outside, join(root, 'link'));
});

afterAll(() => {
	for (const dir of [root, home, outside]) rmSync(dir, { recursive: true, force: true });
});

function contextFor(command: string, overrides: Partial<ClassifierContext> = {}): ClassifierContext {
	return {
		parsed: parseCommand(command),
		sandboxRoot: root,
		homeDir: home,
		platform: 'gnu',
		protectedPaths: ['/etc/**', '/dev/**', '~/.bashrc'],
		allowedExternalPaths: ['/dev/null'],
		...overrides,
	};
}

describe('destructiveRootClassifier', () => {
	const evaluate = (command: string) => destructiveRootClassifier.evaluate(contextFor(command));

	it('rejects recursive deletes of the filesystem root', () => {
		expect(evaluate('rm -rf /')).toEqual({
			category: 'destructive',
			reason: 'Recursive delete targets "/", which is the sandbox root or one of its ancestors',
		});
	});

	it('rejects recursive deletes of the sandbox root and its parent', () => {
		expect(evaluate('rm -rf .')?.reason).toBe(
			'Recursive delete targets ".", which is the sandbox root or one of its ancestors',
		);
		expect(evaluate('rm -r ..')?.category).toBe('destructive');
		expect(evaluate(`rm --recursive ${root}`)?.category).toBe('destructive');
	});

	it('rejects an unguarded wildcard even without -r', () => {
		expect(evaluate('rm -rf *')?.reason).toBe('Recursive delete targets the unguarded wildcard "*" at the sandbox root');
		expect(evaluate('rm *')?.reason).toBe('Delete targets the unguarded wildcard "*" at the sandbox root');
		expect(evaluate('rm -rf ./*')?.category).toBe('destructive');
	});

	it('rejects recursive deletes of paths only known at run time', () => {
		expect(evaluate('rm -rf "$TARGET"')?.reason).toBe(
			'Recursive delete targets "$TARGET", which is only known at run time',
		);
	});

	it('allows deletes of named entries below the root', () => {
		expect(evaluate('rm -rf build')).toBeNull();
		expect(evaluate('rm -f *.tmp')).toBeNull();
		expect(evaluate(`rm -rf '*'`)).toBeNull();
		expect(evaluate('rm .')).toBeNull();
	});

	it('sees through wrappers and nested shells', () => {
		expect(evaluate('sudo rm -rf /')?.category).toBe('destructive');
		expect(evaluate(`sh -c 'rm -rf /'`)?.category).toBe('destructive');
		expect(evaluate('cd sub && rm -rf ..')?.category).toBe('destructive');
	});

	it('sees commands inside substitutions and find -exec', () => {
		expect(evaluate('echo "$(rm -rf /)"')?.reason).toBe(
			'Recursive delete targets "/", which is the sandbox root or one of its ancestors',
		);
		expect(evaluate('echo `rm -rf .`')?.category).toBe('destructive');
		expect(evaluate('find logs -exec rm -rf / \\;')?.category).toBe('destructive');
	});

	it('rejects unfiltered find deletions from the root', () => {
		expect(evaluate('find . -delete')?.reason).toBe(
			'find with deletion targets ".", which is the sandbox root or one of its ancestors',
		);
		expect(evaluate('find -delete')?.category).toBe('destructive');
		expect(evaluate('find / -exec rm {} +')?.category).toBe('destructive');
	});

	it('allows filtered or scoped find deletions', () => {
		expect(evaluate(`find . -name '*.tmp' -delete`)).toBeNull();
		expect(evaluate('find logs -delete')).toBeNull();
		expect(evaluate('find . -type f')).toBeNull();
	});
});

describe('pathContainmentClassifier', () => {
	it('rejects single- and multi-level traversal out of the root', () => {
		expect(findContainmentViolation(contextFor('cat ../secret.txt'))).toEqual({
			token: '../secret.txt',
			resolved: join(dirname(root), 'secret.txt'),
			reason: `Path "../secret.txt" resolves to ${join(dirname(root), 'secret.txt')}, outside the sandbox root`,
		});
		expect(pathContainmentClassifier.evaluate(contextFor('cat sandbox/../../../etc/passwd'))?.category).toBe(
			'containment',
		);
	});

	it('allows paths that stay inside after normalization', () => {
		expect(findContainmentViolation(contextFor('cat sub/../notes.txt'))).toBeNull();
		expect(findContainmentViolation(contextFor('ls -la'))).toBeNull();
		expect(findContainmentViolation(contextFor('cp a.txt sub/b.txt'))).toBeNull();
	});

	it('follows symlinks that lead outside', () => {
		expect(findContainmentViolation(contextFor('cat link/file.txt'))?.resolved).toBe(join(outside, 'file.txt'));
	});

	it('checks redirection targets but not descriptor duplication', () => {
		expect(findContainmentViolation(contextFor('echo hi > /opt/out.txt'))?.token).toBe('/opt/out.txt');
		expect(findContainmentViolation(contextFor('ls 2>&1'))).toBeNull();
		expect(findContainmentViolation(contextFor('ls > /dev/null'))).toBeNull();
	});

	it('expands the home directory', () => {
		expect(findContainmentViolation(contextFor('cat ~/notes.txt'))?.resolved).toBe(join(home, 'notes.txt'));
		expect(findContainmentViolation(contextFor('cat ~/notes.txt', { homeDir: root }))).toBeNull();
	});

	it('rejects paths only known at run time', () => {
		expect(findContainmentViolation(contextFor('cat $SECRET_FILE'))?.reason).toBe(
			'"$SECRET_FILE" is expanded at run time and cannot be checked',
		);
	});

	it('tracks cd and a bare cd to an outside home', () => {
		expect(findContainmentViolation(contextFor('cd / && ls'))?.token).toBe('/');
		expect(findContainmentViolation(contextFor('cd'))?.reason).toBe(
			`cd without an argument moves to ${home}, outside the sandbox root`,
		);
		expect(findContainmentViolation(contextFor('cd', { homeDir: root }))).toBeNull();
		expect(findContainmentViolation(contextFor('cd sub && cat ../../x'))?.token).toBe('../../x');
	});

	it('resolves against the working directory when given', () => {
		const context = contextFor('cat ../x.txt', { workingDir: join(root, 'sub') });
		expect(findContainmentViolation(context)).toBeNull();
	});

	it('reads grep and sed scripts as scripts, not paths', () => {
		expect(findContainmentViolation(contextFor(`grep '../not-a-path' file.txt`))).toBeNull();
		expect(findContainmentViolation(contextFor('grep -e pattern ../x'))?.token).toBe('../x');
		expect(findContainmentViolation(contextFor(`sed -i 's/a/b/' ../x`))?.token).toBe('../x');
	});
});

describe('pathContainmentClassifier on nested commands', () => {
	it('checks the commands inside substitutions', () => {
		expect(findContainmentViolation(contextFor('echo "$(cat ../secret.txt)"'))).toEqual({
			token: '../secret.txt',
			resolved: join(dirname(root), 'secret.txt'),
			reason: `Path "../secret.txt" resolves to ${join(dirname(root), 'secret.txt')}, outside the sandbox root`,
		});
		expect(findContainmentViolation(contextFor('printf %s "$(cat ../../../etc/passwd)"'))?.token).toBe(
			'../../../etc/passwd',
		);
		expect(findContainmentViolation(contextFor('echo `cat /etc/passwd`'))?.token).toBe('/etc/passwd');
		expect(findContainmentViolation(contextFor('echo "$(date)"'))).toBeNull();
	});

	it('checks the commands find runs and the files it writes', () => {
		expect(findContainmentViolation(contextFor('find . -maxdepth 0 -exec cat ../../../etc/passwd ;'))?.token).toBe(
			'../../../etc/passwd',
		);
		expect(findContainmentViolation(contextFor('find . -exec cat {} ../x \\;'))?.token).toBe('../x');
		expect(findContainmentViolation(contextFor('find . -fprint ../list.txt'))?.token).toBe('../list.txt');
		expect(findContainmentViolation(contextFor('find . -name x -exec cat {} +'))).toBeNull();
	});

	it('rejects nesting deeper than it follows', () => {
		expect(findContainmentViolation(contextFor('echo $(echo $(echo $(echo $(echo $(ls)))))'))?.reason).toBe(
			'Command nests shells or substitutions too deeply to check',
		);
	});
});

describe('pathContainmentClassifier on option values', () => {
	it('reads paths glued to short options', () => {
		expect(findContainmentViolation(contextFor('sort -o../escaped.txt data.txt'))).toEqual({
			token: '../escaped.txt',
			resolved: join(dirname(root), 'escaped.txt'),
			reason: `Path "../escaped.txt" resolves to ${join(dirname(root), 'escaped.txt')}, outside the sandbox root`,
		});
		expect(findContainmentViolation(contextFor('cp -t.. a.txt'))?.token).toBe('..');
		expect(findContainmentViolation(contextFor('tar -C/ -xf a.tar'))?.token).toBe('/');
		expect(findContainmentViolation(contextFor('tar -xzf/opt/a.tar'))?.token).toBe('/opt/a.tar');
		expect(findContainmentViolation(contextFor('wget -O../page.html'))?.token).toBe('../page.html');
	});

	it('leaves short option values that are not paths alone', () => {
		expect(findContainmentViolation(contextFor('cut -d/ -f1 data.txt'))).toBeNull();
		expect(findContainmentViolation(contextFor('sort -o sorted.txt data.txt'))).toBeNull();
		expect(findContainmentViolation(contextFor('head -n5 data.txt'))).toBeNull();
	});

	it('checks the file operands of test and [', () => {
		expect(findContainmentViolation(contextFor('[ -f ../../etc/shadow ]'))?.token).toBe('../../etc/shadow');
		expect(findContainmentViolation(contextFor('test -e /root/.ssh/id_rsa'))?.token).toBe('/root/.ssh/id_rsa');
		expect(findContainmentViolation(contextFor('[ notes.txt -nt /opt/x ]'))?.token).toBe('/opt/x');
		expect(findContainmentViolation(contextFor('test -f notes.txt'))).toBeNull();
		expect(findContainmentViolation(contextFor('[ -n "$NAME" ]'))).toBeNull();
	});
});

describe('pathContainmentClassifier on sed and awk programs', () => {
	it('checks files named inside the program', () => {
		expect(findContainmentViolation(contextFor(`sed -n 'w ../escaped2.txt' data.txt`))?.token).toBe(
			'../escaped2.txt',
		);
		expect(findContainmentViolation(contextFor(`sed 's/a/b/w ../out.txt' f.txt`))?.token).toBe('../out.txt');
		expect(findContainmentViolation(contextFor(`sed '1r /opt/header.txt' f.txt`))?.token).toBe('/opt/header.txt');
		expect(findContainmentViolation(contextFor(`awk '{ print > "../out.txt" }' data.txt`))?.token).toBe(
			'../out.txt',
		);
	});

	it('rejects programs whose effects cannot be read off the text', () => {
		expect(findContainmentViolation(contextFor(`sed 's/x/y/e' f.txt`))).toEqual({
			token: 'sed',
			resolved: null,
			reason: 'sed s///e flag runs the pattern space as a command and cannot be checked',
		});
		expect(findContainmentViolation(contextFor('sed -f prog.sed f.txt'))?.reason).toBe(
			'sed program file contents are not inspected and cannot be checked',
		);
		expect(findContainmentViolation(contextFor('sed "s/x/$NAME/" f.txt'))?.reason).toBe(
			'sed program is built at run time and cannot be checked',
		);
		expect(findContainmentViolation(contextFor(`awk '{ system("date") }' f.txt`))?.reason).toBe(
			'awk system() runs shell commands and cannot be checked',
		);
	});

	it('allows programs that stay inside', () => {
		expect(findContainmentViolation(contextFor(`sed -n 's/a/b/w changes.txt' f.txt`))).toBeNull();
		expect(findContainmentViolation(contextFor(`sed 's/foo/bar/g' f.txt`))).toBeNull();
		expect(findContainmentViolation(contextFor(`awk '$3 > 10 { print $1 }' data.txt`))).toBeNull();
	});
});

describe('platformCompatClassifier', () => {
	const evaluate = (command: string, platform: Platform) =>
		platformCompatClassifier.evaluate(contextFor(command, { platform }));

	it('requires a suffix argument for BSD sed -i', () => {
		expect(evaluate(`sed -i 's/a/b/' f.txt`, 'bsd')).toEqual({
			category: 'portability',
			reason: "BSD sed -i requires a suffix argument (use -i '' for no backup) (target platform: bsd)",
		});
		expect(evaluate(`sed -i '' 's/a/b/' f.txt`, 'bsd')).toBeNull();
		expect(evaluate(`sed -i .bak 's/a/b/' f.txt`, 'bsd')).toBeNull();
	});

	it('rejects a separate suffix argument for GNU sed -i', () => {
		expect(evaluate(`sed -i '' 's/a/b/' f.txt`, 'gnu')?.reason).toBe(
			'GNU sed reads the separate suffix "" after -i as the script; attach it (-i.bak) or drop it (target platform: gnu)',
		);
		expect(evaluate(`sed -i 's/a/b/' f.txt`, 'gnu')).toBeNull();
		expect(evaluate(`sed -i.bak 's/a/b/' f.txt`, 'gnu')).toBeNull();
	});

	it('knows other flags that differ between userlands', () => {
		expect(evaluate(`grep -P '\\d+' f.txt`, 'bsd')?.reason).toBe(
			'BSD grep does not support Perl regular expressions (-P) (target platform: bsd)',
		);
		expect(evaluate('ls --color=auto', 'bsd')?.reason).toBe(
			'BSD ls does not accept GNU long option --color=auto (target platform: bsd)',
		);
		expect(evaluate('stat -c %s f.txt', 'bsd')?.category).toBe('portability');
		expect(evaluate('date -v+1d', 'gnu')?.reason).toBe(
			'GNU date has no -v or -j; use -d for date arithmetic (target platform: gnu)',
		);
		expect(evaluate('ls --color=auto', 'gnu')).toBeNull();
	});
});

describe('syntaxClassifier', () => {
	const reason = (command: string) => syntaxClassifier.evaluate(contextFor(command))?.reason;

	it('reports the first syntax problem', () => {
		expect(reason(`echo 'abc`)).toBe('Unterminated single quote');
		expect(reason('echo "abc')).toBe('Unterminated double quote');
		expect(reason('echo $(ls')).toBe('Unbalanced parentheses or $( substitution');
		expect(reason('echo `ls')).toBe('Unbalanced backtick substitution');
		expect(reason('ls |')).toBe('Operator "|" is missing an operand');
		expect(reason('# only a comment')).toBe('Command contains no words');
	});

	it('accepts well-formed commands', () => {
		expect(syntaxClassifier.evaluate(contextFor(`sed -i '' 's/a/b/' f.txt`))).toBeNull();
		expect(syntaxClassifier.evaluate(contextFor('ls | wc -l && echo done'))).toBeNull();
	});
});

describe('systemFileClassifier', () => {
	const evaluate = (command: string) => systemFileClassifier.evaluate(contextFor(command));

	it('rejects appends to protected files', () => {
		expect(evaluate(`echo 'new setting' >> /etc/hosts`)).toEqual({
			category: 'system-file',
			reason: 'Redirection >> would modify protected system file /etc/hosts',
		});
		expect(evaluate(`echo 'alias ll="ls -l"' >> ~/.bashrc`)?.reason).toBe(
			`Redirection >> would modify protected system file ${join(home, '.bashrc')}`,
		);
	});

	it('rejects commands that write into protected locations', () => {
		expect(evaluate('cp notes.txt /etc/motd')?.reason).toBe('cp would modify protected system file /etc/motd');
		expect(evaluate('touch /etc/nologin')?.reason).toBe('touch would modify protected system file /etc/nologin');
	});

	it('sees writes named by option values and sed programs', () => {
		expect(evaluate('sort -o /etc/hosts data.txt')?.reason).toBe('sort would modify protected system file /etc/hosts');
		expect(evaluate(`sed -n 'w /etc/motd' f.txt`)?.reason).toBe('sed would modify protected system file /etc/motd');
		expect(evaluate('cp -t/etc/skel notes.txt')?.reason).toBe('cp would modify protected system file /etc/skel');
		expect(evaluate('tar -xf a.tar -C /etc/cron.d')?.reason).toBe(
			'tar would modify protected system file /etc/cron.d',
		);
		expect(evaluate('find . -fprint /etc/list')?.reason).toBe('find would modify protected system file /etc/list');
	});

	it('ignores reads, discards and writes inside the root', () => {
		expect(evaluate('cat /etc/hosts')).toBeNull();
		expect(evaluate('echo x > /dev/null')).toBeNull();
		expect(evaluate('echo x > out.txt')).toBeNull();
	});
});
