import os from 'os';
import path from 'path';
import fse from 'fs-extra';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { DependencyResolver, parseDryRun } from '../src/core/dependencyResolver';
import { ExitError, UnresolvableConflict, ValidationError } from '../src/errors';
import { OperationKind, OperationRequest, PackageSource } from '../src/types';
import { FakeRunner } from './helpers/fakeRunner';

const paths = { pacman: 'pacman', pactree: 'pactree', aurHelper: 'yay' };

const installFirefox: OperationRequest = {
    kind: OperationKind.INSTALL,
    targets: [{ name: 'firefox', source: PackageSource.OFFICIAL }],
};

let workdir: string;

beforeAll(async () => {
    workdir = await fse.mkdtemp(path.join(os.tmpdir(), 'resolver-'));
});

afterAll(async () => {
    await fse.remove(workdir);
});

describe('parseDryRun', () => {
    it('separates packages, warnings and replacements', () => {
        const report = parseDryRun({
            status: { command: 'pacman', args: [], code: 0, signal: null, cancelled: false, timedOut: false, tail: [] },
            stdout: [':: Replace oldfoo with extra/foo? [Y/n]', 'foo 2.0-1', 'nss 3.101-1'],
            stderr: ['warning: nss-3.101-1 is up to date -- reinstalling'],
        });
        expect(report).toEqual({
            packages: [
                { name: 'foo', version: '2.0-1' },
                { name: 'nss', version: '3.101-1' },
            ],
            fatal: [],
            resolved: ['Replace oldfoo with extra/foo?'],
            warnings: ['nss-3.101-1 is up to date -- reinstalling'],
        });
    });
});

describe('DependencyResolver.plan', () => {
    it('reports what an install would pull in', async () => {
        const runner = new FakeRunner().when('pacman -S --print', {
            stdout: ['nss 3.101-1', 'firefox 128.0-1'],
        });
        const plan = await new DependencyResolver(runner, paths).plan(installFirefox);

        expect(runner.commands()).toEqual(['pacman -S --print --print-format %n %v firefox']);
        expect(plan).toEqual({
            toInstall: [
                { name: 'nss', version: '3.101-1', source: PackageSource.OFFICIAL },
                { name: 'firefox', version: '128.0-1', source: PackageSource.OFFICIAL },
            ],
            toRemove: [],
            conflicts: [],
            warnings: [],
        });
    });

    it('fails with UnresolvableConflict on a conflicting dependency', async () => {
        const runner = new FakeRunner().when('pacman -S --print', {
            code: 1,
            stderr: [
                'error: failed to prepare transaction (could not satisfy dependencies)',
                ":: unable to satisfy dependency 'libbar>=2' required by firefox",
            ],
        });
        const planning = new DependencyResolver(runner, paths).plan(installFirefox);

        await expect(planning).rejects.toBeInstanceOf(UnresolvableConflict);
        await expect(planning).rejects.toMatchObject({
            details: ["unable to satisfy dependency 'libbar>=2' required by firefox"],
        });
    });

    it('reports packages that are in conflict', async () => {
        const runner = new FakeRunner().when('pacman -S --print', {
            code: 1,
            stderr: [':: foo and bar are in conflict', 'error: unresolvable package conflicts detected'],
        });
        await expect(new DependencyResolver(runner, paths).plan(installFirefox)).rejects.toMatchObject({
            code: 'conflict',
            details: ['foo and bar are in conflict'],
        });
    });

    it('fails with ExitError when the dry run fails for another reason', async () => {
        const runner = new FakeRunner().when('pacman -S --print', {
            code: 1,
            stderr: ['error: could not lock database: File exists'],
        });
        await expect(new DependencyResolver(runner, paths).plan(installFirefox)).rejects.toBeInstanceOf(ExitError);
    });

    it('plans a removal and reports broken dependents', async () => {
        const ok = new FakeRunner().when('pacman -Rs --print', { stdout: ['vlc 3.0.21-1', 'libvlc 3.0.21-1'] });
        const plan = await new DependencyResolver(ok, paths).plan({
            kind: OperationKind.REMOVE,
            targets: [{ name: 'vlc', source: PackageSource.INSTALLED }],
            recursive: true,
        });
        expect(plan.toRemove.map((p) => p.name)).toEqual(['vlc', 'libvlc']);

        const broken = new FakeRunner().when('pacman -R --print', {
            code: 1,
            stderr: [
                'error: failed to prepare transaction (could not satisfy dependencies)',
                ":: removing glib2 breaks dependency 'glib2' required by gtk3",
            ],
        });
        await expect(
            new DependencyResolver(broken, paths).plan({
                kind: OperationKind.REMOVE,
                targets: [{ name: 'glib2', source: PackageSource.INSTALLED }],
            }),
        ).rejects.toMatchObject({ details: ["removing glib2 breaks dependency 'glib2' required by gtk3"] });
    });

    it('plans a full update from the upgrade dry run and the AUR', async () => {
        const runner = new FakeRunner()
            .when('pacman -Su --print', {
                stdout: ['firefox 128.0-1'],
                stderr: ['warning: linux: ignoring package upgrade (6.9.1-1 => 6.9.2-1)'],
            })
            .when('yay -Qua', { stdout: ['yay-bin 12.3.5-1 -> 12.4.0-1'] });
        const plan = await new DependencyResolver(runner, paths).plan({ kind: OperationKind.UPDATE_ALL });

        expect(runner.commands()).toEqual([
            'pacman -Su --print --print-format %n %v',
            'yay -Qua',
        ]);
        expect(plan.toInstall).toEqual([
            { name: 'firefox', version: '128.0-1', source: PackageSource.OFFICIAL },
            { name: 'yay-bin', version: '12.4.0-1', source: PackageSource.AUR },
        ]);
        expect(plan.warnings[0]).toBe('linux: ignoring package upgrade (6.9.1-1 => 6.9.2-1)');
    });

    it('treats an up-to-date system as nothing to do', async () => {
        const runner = new FakeRunner()
            .when('pacman -Su --print', { stdout: [' there is nothing to do'] })
            .when('yay -Qua', { code: 1 });
        const plan = await new DependencyResolver(runner, paths).plan({ kind: OperationKind.UPDATE_ALL });
        expect(plan.toInstall).toEqual([]);
    });

    it('fails a full update that pacman cannot resolve', async () => {
        const runner = new FakeRunner()
            .when('--print', { code: 1, stderr: [':: foo and bar are in conflict'] })
            .when('pacman -Qu', { stdout: ['foo 1.0-1 -> 2.0-1'] });
        const planning = new DependencyResolver(runner, paths).plan({ kind: OperationKind.UPDATE_ALL });

        await expect(planning).rejects.toBeInstanceOf(UnresolvableConflict);
        await expect(planning).rejects.toMatchObject({ details: ['foo and bar are in conflict'] });
        expect(runner.commands()).toEqual(['pacman -Su --print --print-format %n %v']);
    });

    it('lists orphans for removal', async () => {
        const runner = new FakeRunner().when('pacman -Qtdq', { stdout: ['libold', 'libolder'] });
        const plan = await new DependencyResolver(runner, paths).plan({ kind: OperationKind.ORPHAN_CLEAN });
        expect(plan.toRemove).toEqual([
            { name: 'libold', source: PackageSource.INSTALLED },
            { name: 'libolder', source: PackageSource.INSTALLED },
        ]);

        const none = new FakeRunner().when('pacman -Qtdq', { code: 1 });
        const empty = await new DependencyResolver(none, paths).plan({ kind: OperationKind.ORPHAN_CLEAN });
        expect(empty.toRemove).toEqual([]);
        expect(empty.warnings).toEqual(['No orphaned packages found']);
    });

    it('confirms AUR targets through the helper', async () => {
        const runner = new FakeRunner().when('yay -Sia paru', {
            stdout: [
                'Repository      : aur',
                'Name            : paru',
                'Version         : 2.0.3-1',
                'Depends On      : git  pacman',
            ],
        });
        const plan = await new DependencyResolver(runner, paths).plan({
            kind: OperationKind.INSTALL,
            targets: [{ name: 'paru', source: PackageSource.AUR }],
        });
        expect(plan.toInstall).toEqual([{ name: 'paru', version: '2.0.3-1', source: PackageSource.AUR }]);
        expect(plan.warnings).toEqual([
            'paru is built from source; dependencies resolved at build time: git pacman',
        ]);
    });

    it('rejects AUR targets the AUR does not know', async () => {
        const runner = new FakeRunner().when('yay -Sia', { code: 1 });
        await expect(
            new DependencyResolver(runner, paths).plan({
                kind: OperationKind.INSTALL,
                targets: [{ name: 'no-such-pkg', source: PackageSource.AUR }],
            }),
        ).rejects.toMatchObject({ details: ['target not found in the AUR: no-such-pkg'] });
    });

    it('needs no process to plan cache cleaning', async () => {
        const runner = new FakeRunner();
        await new DependencyResolver(runner, paths).plan({ kind: OperationKind.CACHE_CLEAN });
        expect(runner.calls).toEqual([]);
    });
});

describe('local package files', () => {
    it('rejects a missing file before launching anything', async () => {
        const runner = new FakeRunner();
        const planning = new DependencyResolver(runner, paths).plan({
            kind: OperationKind.INSTALL_LOCAL_FILE,
            filePath: path.join(workdir, 'missing-1.0-1-x86_64.pkg.tar.zst'),
        });
        await expect(planning).rejects.toBeInstanceOf(ValidationError);
        expect(runner.calls).toEqual([]);
    });

    it('rejects files that are not package archives', async () => {
        const file = path.join(workdir, 'notes.txt');
        await fse.writeFile(file, 'not a package');
        const runner = new FakeRunner();
        await expect(
            new DependencyResolver(runner, paths).plan({ kind: OperationKind.INSTALL_LOCAL_FILE, filePath: file }),
        ).rejects.toBeInstanceOf(ValidationError);
        expect(runner.calls).toEqual([]);
    });

    it('rejects a directory with a package name', async () => {
        const dir = path.join(workdir, 'odd-1.0-1-any.pkg.tar.zst');
        await fse.ensureDir(dir);
        await expect(
            new DependencyResolver(new FakeRunner(), paths).plan({
                kind: OperationKind.INSTALL_LOCAL_FILE,
                filePath: dir,
            }),
        ).rejects.toThrow(`Not a regular file: ${dir}`);
    });

    it('dry-runs a valid archive', async () => {
        const file = path.join(workdir, 'foo-1.0-1-x86_64.pkg.tar.zst');
        await fse.writeFile(file, 'archive');
        const runner = new FakeRunner().when('pacman -U', { stdout: ['foo 1.0-1'] });
        const plan = await new DependencyResolver(runner, paths).plan({
            kind: OperationKind.INSTALL_LOCAL_FILE,
            filePath: file,
        });
        expect(runner.commands()).toEqual([`pacman -U --print --print-format %n %v ${file}`]);
        expect(plan.toInstall).toEqual([{ name: 'foo', version: '1.0-1' }]);
        expect(plan.archive).toBe(file);
    });
});

describe('DependencyResolver.tree', () => {
    it('returns the reverse tree without the root', async () => {
        const runner = new FakeRunner().when('pactree -l -u -r glib2', { stdout: ['glib2', 'gtk3', 'firefox'] });
        await expect(new DependencyResolver(runner, paths).tree('glib2', { reverse: true })).resolves.toEqual([
            'gtk3',
            'firefox',
        ]);
    });

    it('returns nothing for unknown packages', async () => {
        const runner = new FakeRunner().when('pactree', { code: 1, stderr: ['error: package "nope" not found'] });
        await expect(new DependencyResolver(runner, paths).tree('nope')).resolves.toEqual([]);
    });

    it('refuses names that pactree would read as options', async () => {
        const runner = new FakeRunner();
        await expect(new DependencyResolver(runner, paths).tree('--config=/tmp/x')).rejects.toBeInstanceOf(
            ValidationError,
        );
        expect(runner.calls).toEqual([]);
    });
});
