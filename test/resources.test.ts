import { describe, expect, it } from "vitest";
import { DecodeError } from "../src/binary/index.ts";
import { createMemoryLogger } from "../src/log.ts";
import {
	findResource,
	imageResourcesTag,
	type PsdImageResources,
	PsdResourceId,
	readImageResources,
	resourceName,
	writeImageResources,
} from "../src/resources/index.ts";

const RESOURCES: PsdImageResources = {
	resources: [
		{ id: PsdResourceId.CAPTION_PASCAL, name: "", signature: "8BIM", type: "string", value: "Hi" },
		{
			id: PsdResourceId.ALPHA_NAMES_PASCAL,
			name: "",
			signature: "8BIM",
			type: "strings",
			unicode: false,
			values: ["Red", "Alpha 2"],
		},
		{
			id: PsdResourceId.ALPHA_NAMES_UNICODE,
			name: "",
			signature: "8BIM",
			type: "strings",
			unicode: true,
			values: ["Äpfel", "Maske"],
		},
		{
			id: PsdResourceId.BACKGROUND_COLOR,
			name: "",
			signature: "8BIM",
			type: "color",
			colorSpace: 0,
			components: [65535, 32768, 0, 0],
		},
		{
			id: PsdResourceId.VERSION_INFO,
			name: "",
			signature: "8BIM",
			type: "version",
			version: 1,
			hasRealMergedData: true,
			writerName: "Test Writer",
			readerName: "Test Reader",
			fileVersion: 1,
		},
		{
			id: PsdResourceId.THUMBNAIL_RESOURCE,
			name: "",
			signature: "8BIM",
			type: "thumbnail",
			format: 1,
			width: 2,
			height: 1,
			widthBytes: 8,
			totalSize: 8,
			bitsPerPixel: 24,
			planes: 1,
			data: Buffer.from([0xff, 0xd8, 0xff, 0xd9, 0]),
		},
		{
			id: 4100,
			name: "plug",
			signature: "MeSa",
			type: "bytes",
			data: Buffer.from([1, 2, 3]),
		},
	],
};

describe("image resources", () => {
	it("writes a block with padded name and payload", () => {
		const bytes = writeImageResources({
			resources: [{ id: 1008, name: "", type: "string", value: "Hi" }],
		});
		expect([...bytes]).toEqual([
			0x38, 0x42, 0x49, 0x4d, 0x03, 0xf0, 0, 0, 0, 0, 0, 3, 2, 0x48, 0x69, 0,
		]);
	});

	it("restores every payload kind", () => {
		const decoded = readImageResources(writeImageResources(RESOURCES));
		expect(decoded).toEqual(RESOURCES);
	});

	it("keeps bytes after the parsed version and thumbnail fields", () => {
		const bytes = writeImageResources({
			resources: [
				{
					id: PsdResourceId.VERSION_INFO,
					name: "",
					signature: "8BIM",
					type: "version",
					version: 1,
					hasRealMergedData: false,
					writerName: "A",
					readerName: "",
					fileVersion: 1,
					trailing: Buffer.from([7, 7]),
				},
				{
					id: PsdResourceId.THUMBNAIL_RESOURCE,
					name: "",
					signature: "8BIM",
					type: "thumbnail",
					format: 1,
					width: 1,
					height: 1,
					widthBytes: 4,
					totalSize: 4,
					bitsPerPixel: 24,
					planes: 1,
					data: Buffer.from([0xff, 0xd8]),
					trailing: Buffer.from([0, 1, 2]),
				},
			],
		});
		// Version payload: 4 + 1 + 6 + 4 + 4 field bytes and 2 trailing.
		expect(bytes.readUInt32BE(8)).toBe(21);
		const decoded = readImageResources(bytes);
		const [version, thumbnail] = decoded.resources;
		expect(version?.type === "version" ? [...(version.trailing ?? [])] : []).toEqual([7, 7]);
		expect(thumbnail?.type === "thumbnail" ? [...thumbnail.data] : []).toEqual([0xff, 0xd8]);
		expect(thumbnail?.type === "thumbnail" ? [...(thumbnail.trailing ?? [])] : []).toEqual([
			0, 1, 2,
		]);
		expect(writeImageResources(decoded).equals(bytes)).toBe(true);
	});

	it("keeps the advisory name from the options", () => {
		const decoded = readImageResources(writeImageResources(RESOURCES), { name: "scan" });
		expect(decoded.name).toBe("scan");
	});

	it("stops with a warning at an unknown signature", () => {
		const bytes = Buffer.concat([
			writeImageResources({ resources: [{ id: 1008, name: "", type: "string", value: "Hi" }] }),
			Buffer.from("XXXX"),
		]);
		const logger = createMemoryLogger();
		const decoded = readImageResources(bytes, { logger });
		expect(decoded.resources).toHaveLength(1);
		expect(logger.messages).toEqual(['Image resources end at 16 on signature "XXXX"']);
	});

	it("rejects a truncated block", () => {
		const bytes = Buffer.from([0x38, 0x42, 0x49, 0x4d, 0x04, 0x04, 0, 0, 0, 0, 0, 10, 1, 2]);
		expect(() => readImageResources(bytes)).toThrow(DecodeError);
	});

	it("finds resources by id", () => {
		expect(findResource(RESOURCES, 1010)?.type).toBe("color");
		expect(findResource(RESOURCES, 1039)).toBeUndefined();
	});

	it("names ids and folds the path and plug-in ranges", () => {
		expect(resourceName(1005)).toBe("RESOLUTION_INFO");
		expect(resourceName(2500)).toBe("PATH_INFO");
		expect(resourceName(4100)).toBe("PLUGIN_RESOURCE");
		expect(resourceName(1)).toBeUndefined();
	});

	it("builds the container tag entry", () => {
		const [tag, type, count, bytes, once] = imageResourcesTag(RESOURCES);
		expect(tag).toBe(34377);
		expect(type).toBe(7);
		expect(count).toBe(bytes.length);
		expect(bytes.equals(writeImageResources(RESOURCES))).toBe(true);
		expect(once).toBe(true);
	});
});
