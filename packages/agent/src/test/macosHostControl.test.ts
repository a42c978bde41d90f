import assert from "node:assert/strict";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { test } from "node:test";
import { CommandExecutor } from "../hostControl";
import {
  MacosHostControl,
  parseAirportInfo,
  parseAirportNetwork,
  parseAirportScan,
  parseBlueutilDevices,
  parseBrightnessList,
  parseDfRow,
  parseDiskutilInfo,
  parseNetstatIb,
  parsePmsetBattery,
  parseVolumeSettings,
} from "../macosHostControl";
import { CommandResult } from "../types";

class ScriptedRunner implements CommandExecutor {
  public readonly calls: string[] = [];

  public constructor(private readonly outputs: Record<string, CommandResult>) {}

  public async run(argv: readonly string[]): Promise<CommandResult> {
    const key = argv.join(" ");
    this.calls.push(key);
    return this.outputs[key] ?? { success: false, error: `Command not found: ${argv[0]}` };
  }
}

const ok = (stdout: string): CommandResult => ({ success: true, stdout, stderr: "", exitCode: 0 });

test("osascript volume settings and brightness listings are parsed", () => {
  assert.deepEqual(parseVolumeSettings("output volume:50, input volume:75, alert volume:100, output muted:false"), {
    volume: 50,
    muted: false,
  });
  assert.deepEqual(parseVolumeSettings("output volume:0, output muted:true"), { volume: 0, muted: true });
  assert.equal(parseVolumeSettings("missing value"), null);

  assert.equal(
    parseBrightnessList("display 0: main, active, awake, online, built-in, ID 0x4280a80\ndisplay 0: brightness 0.750000"),
    75,
  );
  assert.equal(parseBrightnessList("no displays"), null);
});

test("airport and networksetup output describe the current network", () => {
  const info = ["     agrCtlRSSI: -55", "     agrExtRSSI: 0", "          BSSID: 11:22:33:44:55:66", "           SSID: HomeNet"].join(
    "\n",
  );
  assert.deepEqual(parseAirportInfo(info), { ssid: "HomeNet", signalStrength: 90 });
  assert.equal(parseAirportInfo("AirPort: Off"), null);

  assert.equal(parseAirportNetwork("Current Wi-Fi Network: HomeNet\n"), "HomeNet");
  assert.equal(parseAirportNetwork("You are not associated with an AirPort network."), null);
});

test("airport scan rows keep SSIDs with spaces and derive frequency from channel", () => {
  const stdout = [
    "                            SSID BSSID             RSSI CHANNEL HT CC SECURITY (auth/unicast/group)",
    "                         HomeNet 11:22:33:44:55:66 -55  36,+1   Y  US WPA2(PSK/AES/AES)",
    "                     Coffee Shop aa:bb:cc:dd:ee:ff -70  6       Y  -- NONE",
  ].join("\n");

  assert.deepEqual(parseAirportScan(stdout, "HomeNet"), [
    { ssid: "HomeNet", signalStrength: 90, frequency: 5180, connected: true },
    { ssid: "Coffee Shop", signalStrength: 60, frequency: 2437, connected: false },
  ]);
});

test("blueutil JSON is normalised to upper-case colon addresses", () => {
  const stdout = JSON.stringify([
    { address: "aa-bb-cc-dd-ee-01", name: "Magic Mouse", RSSI: -48, paired: true, connected: true },
    { address: "aa-bb-cc-dd-ee-02", name: "", paired: false, connected: false },
    5,
  ]);

  assert.deepEqual(parseBlueutilDevices(stdout), [
    { address: "AA:BB:CC:DD:EE:01", name: "Magic Mouse", rssi: -48, paired: true, connected: true },
    { address: "AA:BB:CC:DD:EE:02", name: "AA:BB:CC:DD:EE:02", rssi: null, paired: false, connected: false },
  ]);
  assert.deepEqual(parseBlueutilDevices("oops"), []);
});

test("df, diskutil, pmset and netstat output are parsed", () => {
  assert.deepEqual(
    parseDfRow(
      [
        "Filesystem   1024-blocks     Used Available Capacity iused ifree %iused  Mounted on",
        "/dev/disk4s1    15620096  1048576  14571520     7%     1     0  100%   /Volumes/STICK",
      ].join("\n"),
    ),
    { device: "/dev/disk4s1", sizeGb: 14.9 },
  );

  assert.deepEqual(parseDiskutilInfo("   Device Node:              /dev/disk4s1\n   File System Personality:  MS-DOS FAT32\n"), {
    deviceNode: "/dev/disk4s1",
    filesystem: "MS-DOS FAT32",
  });

  assert.deepEqual(
    parsePmsetBattery("Now drawing from 'AC Power'\n -InternalBattery-0 (id=4653155)\t85%; charging; 1:20 remaining present: true"),
    { percent: 85, plugged: true },
  );
  assert.deepEqual(
    parsePmsetBattery("Now drawing from 'Battery Power'\n -InternalBattery-0 (id=4653155)\t42%; discharging; 3:10 remaining"),
    { percent: 42, plugged: false },
  );
  assert.equal(parsePmsetBattery("Now drawing from 'AC Power'"), null);

  const netstat = [
    "Name       Mtu   Network       Address            Ipkts Ierrs     Ibytes    Opkts Oerrs     Obytes  Coll",
    "lo0        16384 <Link#1>                        1000     0     500000     1000     0     500000     0",
    "en0        1500  <Link#6>    a4:83:e7:00:00:01  20000     0   30000000    10000     0    2000000     0",
    "en0        1500  192.168.1     192.168.1.20      19000     -   29000000     9000     -    1900000     -",
    "utun0      1380  <Link#12>                          10     0       1000       20     0       2000     0",
  ].join("\n");
  assert.deepEqual(parseNetstatIb(netstat), { sent: 2002000, received: 30001000 });
});

test("provider toggles mute from the current state and clamps brightness", async () => {
  const runner = new ScriptedRunner({
    "osascript -e get volume settings": ok("output volume:30, input volume:50, alert volume:100, output muted:false"),
    "osascript -e set volume output muted true": ok(""),
    "brightness 0.55": ok(""),
    "osascript -e set volume output volume 0": ok(""),
  });
  const host = new MacosHostControl(runner, { mountTimeoutMs: 30_000 });

  assert.deepEqual(await host.toggleMute(), { success: true, muted: true });
  assert.deepEqual(await host.setBrightness(55), { success: true, brightness: 55 });
  assert.deepEqual(await host.setVolume(-3), { success: true, volume: 0 });
  assert.deepEqual(await host.listUnmountedDrives(), []);
  assert.equal(await host.isBluetoothAvailable(), false);
});

test("provider lists external volumes and skips system and hidden ones", async () => {
  const root = mkdtempSync(join(tmpdir(), "hostlink-volumes-"));
  try {
    mkdirSync(join(root, "STICK"));
    mkdirSync(join(root, "Macintosh HD"));
    mkdirSync(join(root, ".Trashes"));
    writeFileSync(join(root, "notes.txt"), "not a volume");

    const stick = join(root, "STICK");
    const runner = new ScriptedRunner({
      [`df -k ${stick}`]: ok(
        "Filesystem 1024-blocks Used Available Capacity iused ifree %iused Mounted on\n/dev/disk4s1 15620096 1048576 14571520 7% 1 0 100% " +
          stick,
      ),
      [`diskutil info ${stick}`]: ok("   Device Node:  /dev/disk4s1\n   File System Personality:  ExFAT\n"),
    });
    const host = new MacosHostControl(runner, { mountTimeoutMs: 30_000, volumesRoot: root });

    assert.deepEqual(await host.listDrives(), [
      {
        deviceNode: "/dev/disk4s1",
        name: "STICK",
        sizeGb: 14.9,
        mountPoints: [{ device: "/dev/disk4s1", mountPoint: stick, mountName: "STICK", filesystem: "ExFAT" }],
        files: [],
      },
    ]);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

test("a failing df or diskutil run fails the whole volume scan", async () => {
  const root = mkdtempSync(join(tmpdir(), "hostlink-volumes-"));
  try {
    mkdirSync(join(root, "STICK"));
    const stick = join(root, "STICK");
    const runner = new ScriptedRunner({
      [`diskutil info ${stick}`]: ok("   Device Node:  /dev/disk4s1\n"),
    });
    const host = new MacosHostControl(runner, { mountTimeoutMs: 30_000, volumesRoot: root });

    assert.equal(await host.listDrives(), null);

    const missingRoot = new MacosHostControl(runner, { mountTimeoutMs: 30_000, volumesRoot: join(root, "absent") });
    assert.equal(await missingRoot.listDrives(), null);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});
