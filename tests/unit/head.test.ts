import { describe, test, expect } from "vitest";
import { archive_version, create_head_resolver } from "../../head";
import { create_memory_archive, type GraphStorage } from "../../archive";

const ORIGIN = "https://example.org/repo";

const setup = () => {
	const archive = create_memory_archive();
	const readme = archive.add_blob("hello");
	const dir_a = archive.add_directory([{ name: "README", type: "file", target: readme }]);
	const dir_b = archive.add_directory([{ name: "NOTES", type: "file", target: readme }]);
	const rev_a = archive.add_revision(dir_a, "a");
	const rev_b = archive.add_revision(dir_b, "b");
	return { archive, dir_a, dir_b, rev_a, rev_b };
};

describe("archive_version", () => {
	test("parses release archive names", () => {
		expect(archive_version("hello-0.0.1.tar.gz")).toEqual([0, 0, 1, 0]);
		expect(archive_version("hello-0.0.1-beta2.tar.gz")).toEqual([0, 0, 1, -1, "beta2"]);
		expect(archive_version("hello_2.10.zip")).toEqual([2, 10, 0]);
	});

	test("returns null for other names", () => {
		expect(archive_version("README")).toBeNull();
		expect(archive_version("refs/heads/main")).toBeNull();
	});
});

describe("HeadResolver", () => {
	test("resolves HEAD through a revision", async () => {
		const { archive, dir_a, rev_a } = setup();
		archive.add_snapshot(ORIGIN, { HEAD: { target_type: "revision", target: rev_a } });

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: true, value: { branch: "HEAD", revision_id: rev_a, directory_id: dir_a } });
	});

	test("follows alias chains", async () => {
		const { archive, dir_b, rev_b } = setup();
		archive.add_snapshot(ORIGIN, {
			HEAD: { target_type: "alias", target: "refs/heads/develop" },
			"refs/heads/develop": { target_type: "alias", target: "refs/heads/trunk" },
			"refs/heads/trunk": { target_type: "revision", target: rev_b },
		});

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: true, value: { branch: "HEAD", revision_id: rev_b, directory_id: dir_b } });
	});

	test("uses the configured precedence", async () => {
		const { archive, dir_a, dir_b, rev_a, rev_b } = setup();
		archive.add_snapshot(ORIGIN, {
			master: { target_type: "revision", target: rev_a },
			main: { target_type: "revision", target: rev_b },
		});

		const defaults = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);
		expect(defaults.ok && defaults.value.directory_id).toBe(dir_b);

		const custom = await create_head_resolver({ graph: archive, branch_names: ["master"] }).resolve_head(ORIGIN);
		expect(custom.ok && custom.value.directory_id).toBe(dir_a);
	});

	test("resolves a release to its revision's directory", async () => {
		const { archive, dir_a, rev_a } = setup();
		const release = archive.add_release(rev_a, "revision", "v1");
		archive.add_snapshot(ORIGIN, { HEAD: { target_type: "release", target: release } });

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: true, value: { branch: "HEAD", revision_id: rev_a, directory_id: dir_a } });
	});

	test("resolves a branch pointing straight at a directory", async () => {
		const { archive, dir_a } = setup();
		archive.add_snapshot(ORIGIN, { HEAD: { target_type: "directory", target: dir_a } });

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: true, value: { branch: "HEAD", revision_id: null, directory_id: dir_a } });
	});

	test("falls back to the highest release archive", async () => {
		const { archive, dir_a, dir_b, rev_a, rev_b } = setup();
		archive.add_snapshot(ORIGIN, {
			"hello-0.0.1.tar.gz": { target_type: "revision", target: rev_a },
			"hello-0.0.2-beta1.tar.gz": { target_type: "revision", target: rev_a },
			"hello-0.0.2.tar.gz": { target_type: "revision", target: rev_b },
		});

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: true, value: { branch: "hello-0.0.2.tar.gz", revision_id: rev_b, directory_id: dir_b } });
		expect(dir_a).not.toBe(dir_b);
	});

	test("does not fall back when some branch is not an archive", async () => {
		const { archive, rev_a } = setup();
		archive.add_snapshot(ORIGIN, {
			"hello-0.0.1.tar.gz": { target_type: "revision", target: rev_a },
			develop: { target_type: "revision", target: rev_a },
		});

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: false, error: { kind: "no_canonical_branch", origin: ORIGIN, reason: "no matching branch" } });
	});

	test("reports an origin without snapshot", async () => {
		const { archive } = setup();

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: false, error: { kind: "no_canonical_branch", origin: ORIGIN, reason: "no snapshot" } });
	});

	test("reports dangling and cyclic aliases", async () => {
		const { archive } = setup();
		archive.add_snapshot(ORIGIN, { HEAD: null });
		const dangling = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);
		expect(dangling).toEqual({ ok: false, error: { kind: "no_canonical_branch", origin: ORIGIN, reason: "HEAD is dangling" } });

		archive.add_snapshot(ORIGIN, {
			HEAD: { target_type: "alias", target: "main" },
			main: { target_type: "alias", target: "HEAD" },
		});
		const cyclic = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);
		expect(cyclic).toEqual({ ok: false, error: { kind: "no_canonical_branch", origin: ORIGIN, reason: "HEAD is dangling" } });
	});

	test("falls through to the next branch name when one cannot be resolved", async () => {
		const { archive, dir_a, rev_a } = setup();
		archive.add_snapshot(ORIGIN, {
			HEAD: { target_type: "alias", target: "refs/heads/gone" },
			master: { target_type: "revision", target: rev_a },
		});

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: true, value: { branch: "master", revision_id: rev_a, directory_id: dir_a } });
	});

	test("skips null branches and missing targets before the next name", async () => {
		const { archive, dir_b, rev_b } = setup();
		archive.add_snapshot(ORIGIN, {
			HEAD: null,
			"refs/heads/main": { target_type: "revision", target: "0".repeat(64) },
			trunk: { target_type: "revision", target: rev_b },
		});

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: true, value: { branch: "trunk", revision_id: rev_b, directory_id: dir_b } });
	});

	test("reports the first failure when no branch name resolves", async () => {
		const { archive } = setup();
		const blob = archive.add_blob("data");
		archive.add_snapshot(ORIGIN, {
			HEAD: { target_type: "alias", target: "refs/heads/gone" },
			master: { target_type: "content", target: blob },
		});

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: false, error: { kind: "no_canonical_branch", origin: ORIGIN, reason: "HEAD is dangling" } });
	});

	test("refuses branches targeting contents", async () => {
		const { archive } = setup();
		const blob = archive.add_blob("data");
		archive.add_snapshot(ORIGIN, { HEAD: { target_type: "content", target: blob } });

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({ ok: false, error: { kind: "no_canonical_branch", origin: ORIGIN, reason: "HEAD targets a content" } });
	});

	test("reports a missing revision", async () => {
		const { archive } = setup();
		archive.add_snapshot(ORIGIN, { HEAD: { target_type: "revision", target: "0".repeat(64) } });

		const result = await create_head_resolver({ graph: archive }).resolve_head(ORIGIN);

		expect(result).toEqual({
			ok: false,
			error: { kind: "no_canonical_branch", origin: ORIGIN, reason: `revision ${"0".repeat(64)} of HEAD is missing` },
		});
	});

	test("maps graph failures to storage_error", async () => {
		const { archive } = setup();
		const failing: GraphStorage = {
			...archive,
			get_latest_snapshot: () => Promise.reject(new Error("graph unavailable")),
		};

		const result = await create_head_resolver({ graph: failing }).resolve_head(ORIGIN);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe("storage_error");
	});
});
