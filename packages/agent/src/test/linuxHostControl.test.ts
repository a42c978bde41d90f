import assert from "node:assert/strict";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { test } from "node:test";
import { CommandExecutor } from "../hostControl";
import {
  interpretBluetoothctl,
  LinuxHostControl,
  lsblkDrives,
  lsblkUnmounted,
  parseAmixer,
  parseBluetoothctlDevices,
  parseBluetoothctlScan,
  parseBrightnessctl,
  parseLsblk,
  parseNmcliWifi,
  parseProcNetDev,
  parseUdisksMount,
  splitTerseFields,
  summarizePowerSupplies,
} from "../linuxHostControl";
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

const LSBLK_OUTPUT = JSON.stringify({
  blockdevices: [
    {
      name: "nvme0n1",
      path: "/dev/nvme0n1",
      size: 512110190592,
      type: "disk",
      tran: "nvme",
      rm: false,
      label: null,
      model: "Internal SSD",
      fstype: null,
      mountpoint: null,
      children: [
        { name: "nvme0n1p1", path: "/dev/nvme0n1p1", size: 1000, type: "part", fstype: "ext4", mountpoint: "/" },
      ],
    },
    {
      name: "sdb",
      path: "/dev/sdb",
      size: 16008609792,
      type: "disk",
      tran: "usb",
      rm: true,
      label: null,
      model: "Flash Disk",
      fstype: null,
      mountpoint: null,
      children: [
        {
          name: "sdb1",
          path: "/dev/sdb1",
          size: 16006512640,
          type: "part",
          label: "STICK",
          fstype: "vfat",
          mountpoint: "/run/media/user/STICK",
        },
      ],
    },
    {
      name: "sdc",
      size: "2147483648",
      type: "disk",
      tran: null,
      rm: "1",
      model: "Card Reader",
      children: [{ name: "sdc1", size: "2146435072", type: "part", label: "", fstype: "exfat", mountpoint: null }],
    },
  ],
});

test("brightnessctl machine output yields the percentage column", () => {
  assert.equal(parseBrightnessctl("intel_backlight,backlight,19200,80%,24000\n"), 80);
  assert.equal(parseBrightnessctl("Device 'x' not found"), null);
});

test("amixer output yields volume and mute state", () => {
  const stdout = [
    "Simple mixer control 'Master',0",
    "  Front Left: Playback 42000 [64%] [-12.00dB] [off]",
    "  Front Right: Playback 42000 [64%] [-12.00dB] [off]",
  ].join("\n");

  assert.deepEqual(parseAmixer(stdout), { volume: 64, muted: true });
  assert.deepEqual(parseAmixer("Mono: Playback [30%] [on]"), { volume: 30, muted: false });
  assert.equal(parseAmixer("no controls"), null);
});

test("nmcli terse fields honour escaped colons", () => {
  assert.deepEqual(splitTerseFields("yes:Cafe\\:Guest:70:2437 MHz"), ["yes", "Cafe:Guest", "70", "2437 MHz"]);
  assert.deepEqual(splitTerseFields("no:back\\\\slash:5:5180 MHz"), ["no", "back\\slash", "5", "5180 MHz"]);
});

test("nmcli listing becomes the Wi-Fi state with ranked, deduplicated networks", () => {
  const stdout = [
    "no:Neighbour:40:2412 MHz",
    "yes:HomeNet:72:5180 MHz",
    "no:HomeNet:55:2437 MHz",
    "no::90:2462 MHz",
    "no:Cafe\\:Guest:81:2437 MHz",
  ].join("\n");

  assert.deepEqual(parseNmcliWifi(stdout), {
    available: true,
    connected: true,
    ssid: "HomeNet",
    signalStrength: 72,
    scan: [
      { ssid: "Cafe:Guest", signalStrength: 81, frequency: 2437, connected: false },
      { ssid: "HomeNet", signalStrength: 72, frequency: 5180, connected: true },
      { ssid: "Neighbour", signalStrength: 40, frequency: 2412, connected: false },
    ],
  });
});

test("bluetoothctl scan output collects names and the latest RSSI", () => {
  const stdout = [
    "Discovery started",
    "[CHG] Controller 00:1A:7D:DA:71:13 Discovering: yes",
    "\u001b[0;92m[NEW]\u001b[0m Device 11:22:33:44:55:66 Pixel Buds",
    "[CHG] Device 11:22:33:44:55:66 RSSI: -61",
    "[NEW] Device aa:bb:cc:dd:ee:ff aa-bb-cc-dd-ee-ff",
    "[CHG] Device AA:BB:CC:DD:EE:FF RSSI: 0xffffffb5 (-75)",
    "[CHG] Device AA:BB:CC:DD:EE:FF Name: Desk Lamp",
    "[CHG] Device 11:22:33:44:55:66 RSSI: -58",
  ].join("\n");

  assert.deepEqual(parseBluetoothctlScan(stdout), [
    { address: "11:22:33:44:55:66", name: "Pixel Buds", rssi: -58 },
    { address: "AA:BB:CC:DD:EE:FF", name: "Desk Lamp", rssi: -75 },
  ]);
});

test("bluetoothctl device lists and action output are interpreted", () => {
  assert.deepEqual(parseBluetoothctlDevices("Device 11:22:33:44:55:66 Pixel Buds\nDevice 22:33:44:55:66:77\n"), [
    { address: "11:22:33:44:55:66", name: "Pixel Buds" },
    { address: "22:33:44:55:66:77", name: "22:33:44:55:66:77" },
  ]);

  assert.deepEqual(interpretBluetoothctl(ok("Attempting to connect to 11:22:33:44:55:66\nConnection successful")), {
    success: true,
    message: "Connection successful",
  });
  assert.deepEqual(
    interpretBluetoothctl(ok("Attempting to connect to 11:22:33:44:55:66\nFailed to connect: org.bluez.Error.Failed")),
    { success: false, error: "Failed to connect: org.bluez.Error.Failed" },
  );
  assert.deepEqual(interpretBluetoothctl({ success: false, error: "Command not found: bluetoothctl" }), {
    success: false,
    error: "Command not found: bluetoothctl",
  });
});

test("lsblk output yields mounted removable drives and unmounted volumes", () => {
  const devices = parseLsblk(LSBLK_OUTPUT);
  assert.ok(devices);

  assert.deepEqual(lsblkDrives(devices), [
    {
      deviceNode: "/dev/sdb",
      name: "STICK",
      sizeGb: 14.91,
      mountPoints: [
        { device: "/dev/sdb1", mountPoint: "/run/media/user/STICK", mountName: "STICK", filesystem: "vfat" },
      ],
      files: [],
    },
  ]);

  assert.deepEqual(lsblkUnmounted(devices), [
    { deviceNode: "/dev/sdc1", name: "Card Reader", filesystem: "exfat", sizeGb: 2 },
  ]);
  assert.equal(parseLsblk("not json"), null);
  assert.equal(parseLsblk(JSON.stringify({ devices: [] })), null);
  assert.deepEqual(parseLsblk(JSON.stringify({ blockdevices: [] })), []);
});

test("udisksctl mount output yields the mount point", () => {
  assert.equal(parseUdisksMount("Mounted /dev/sdb1 at /run/media/user/STICK\n"), "/run/media/user/STICK");
  assert.equal(parseUdisksMount("Mounted /dev/sdb1 at /media/STICK."), "/media/STICK");
  assert.equal(parseUdisksMount("Error mounting"), null);
});

test("power supplies summarise to a battery state", () => {
  assert.deepEqual(
    summarizePowerSupplies([
      { name: "AC", type: "Mains", online: "1" },
      { name: "BAT0", type: "Battery", capacity: "81", status: "Discharging" },
    ]),
    { percent: 81, plugged: true },
  );
  assert.deepEqual(
    summarizePowerSupplies([
      { name: "BAT0", type: "Battery", capacity: "50", status: "Discharging" },
      { name: "BAT1", type: "Battery", capacity: "75", status: "Discharging" },
    ]),
    { percent: 62.5, plugged: false },
  );
  assert.equal(summarizePowerSupplies([{ name: "AC", type: "Mains", online: "1" }]), null);
});

test("/proc/net/dev totals skip loopback", () => {
  const text = [
    "Inter-|   Receive                                                |  Transmit",
    " face |bytes    packets errs drop fifo frame compressed multicast|bytes    packets errs drop fifo colls carrier compressed",
    "    lo:  5000      50    0    0    0     0          0         0   5000      50    0    0    0     0       0          0",
    "  eth0: 1000      10    0    0    0     0          0         0    300       3    0    0    0     0       0          0",
    " wlan0:  200       2    0    0    0     0          0         0     40       1    0    0    0     0       0          0",
  ].join("\n");

  assert.deepEqual(parseProcNetDev(text), { sent: 340, received: 1200 });
});

test("provider clamps levels and maps tool failures to values", async () => {
  const runner = new ScriptedRunner({
    "brightnessctl set 1%": ok("Updated device 'intel_backlight'"),
    "amixer set Master 100%": ok("Mono: Playback [100%] [on]"),
    "amixer set Master toggle": ok("Mono: Playback [100%] [off]"),
    "udisksctl mount -b /dev/sdc1": ok("Mounted /dev/sdc1 at /run/media/user/CARD"),
  });
  const host = new LinuxHostControl(runner, { mountTimeoutMs: 30_000 });

  assert.deepEqual(await host.setBrightness(-20), { success: true, brightness: 1 });
  assert.deepEqual(await host.setVolume(250), { success: true, volume: 100 });
  assert.deepEqual(await host.toggleMute(), { success: true, muted: true });
  assert.deepEqual(await host.mountDrive("/dev/sdc1"), {
    success: true,
    mountPoint: "/run/media/user/CARD",
    message: "Mounted at /run/media/user/CARD",
  });
  assert.deepEqual(await host.getBrightness(), {
    available: false,
    brightness: 0,
    error: "Command not found: brightnessctl",
  });
  assert.deepEqual(await host.getWifi(), {
    available: false,
    connected: false,
    ssid: null,
    signalStrength: 0,
    scan: [],
    error: "Command not found: nmcli",
  });
  assert.deepEqual(await host.bluetoothAction("unpair", "11:22:33:44:55:66"), {
    success: false,
    error: "Command not found: bluetoothctl",
  });
  assert.ok(runner.calls.includes("bluetoothctl remove 11:22:33:44:55:66"));
});

test("provider reads battery and counters from sysfs and procfs roots", async () => {
  const root = mkdtempSync(join(tmpdir(), "hostlink-linux-"));
  try {
    const supplies = join(root, "sys", "class", "power_supply");
    mkdirSync(join(supplies, "BAT0"), { recursive: true });
    mkdirSync(join(supplies, "AC"), { recursive: true });
    writeFileSync(join(supplies, "BAT0", "type"), "Battery\n");
    writeFileSync(join(supplies, "BAT0", "capacity"), "47\n");
    writeFileSync(join(supplies, "BAT0", "status"), "Charging\n");
    writeFileSync(join(supplies, "AC", "type"), "Mains\n");
    writeFileSync(join(supplies, "AC", "online"), "0\n");

    mkdirSync(join(root, "proc", "net"), { recursive: true });
    writeFileSync(
      join(root, "proc", "net", "dev"),
      "Inter-|\n face |\n  eth0: 10 0 0 0 0 0 0 0 20 0 0 0 0 0 0 0\n",
    );

    const host = new LinuxHostControl(new ScriptedRunner({}), {
      mountTimeoutMs: 30_000,
      sysfsRoot: join(root, "sys"),
      procfsRoot: join(root, "proc"),
    });

    assert.deepEqual(await host.getBattery(), { percent: 47, plugged: true });
    assert.deepEqual(await host.getNetworkCounters(), { sent: 20, received: 10 });
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});

const LSBLK_COMMAND = "lsblk -J -b -o NAME,PATH,SIZE,TYPE,TRAN,RM,LABEL,MODEL,FSTYPE,MOUNTPOINT";

test("a failed or unreadable lsblk run is reported as a failed scan, not as no drives", async () => {
  const timedOut = new LinuxHostControl(
    new ScriptedRunner({ [LSBLK_COMMAND]: { success: false, error: "Command timeout (5s)" } }),
    { mountTimeoutMs: 30_000 },
  );
  assert.equal(await timedOut.listDrives(), null);
  assert.equal(await timedOut.listUnmountedDrives(), null);

  const garbled = new LinuxHostControl(new ScriptedRunner({ [LSBLK_COMMAND]: ok("lsblk: unknown column") }), {
    mountTimeoutMs: 30_000,
  });
  assert.equal(await garbled.listDrives(), null);

  const empty = new LinuxHostControl(new ScriptedRunner({ [LSBLK_COMMAND]: ok('{"blockdevices": []}') }), {
    mountTimeoutMs: 30_000,
  });
  assert.deepEqual(await empty.listDrives(), []);
});

test("unmount falls back to umount only when udisksctl cannot find the target", async () => {
  const fallback = new ScriptedRunner({ "sudo umount /dev/sdb1": ok("") });
  const host = new LinuxHostControl(fallback, { mountTimeoutMs: 30_000 });

  assert.deepEqual(await host.unmountDrive("/dev/sdb1"), { success: true, message: "Safely removed /dev/sdb1" });
  assert.deepEqual(fallback.calls, ["udisksctl unmount -b /dev/sdb1", "sudo umount /dev/sdb1"]);

  const manualFails = new LinuxHostControl(new ScriptedRunner({}), { mountTimeoutMs: 30_000 });
  assert.deepEqual(await manualFails.unmountDrive("/dev/sdb1"), { success: false, error: "Manual unmount failed" });

  const busy = new ScriptedRunner({
    "udisksctl unmount -b /dev/sdb1": { success: false, stderr: "Error unmounting /dev/sdb1: target is busy", exitCode: 1 },
  });
  const busyHost = new LinuxHostControl(busy, { mountTimeoutMs: 30_000 });
  assert.deepEqual(await busyHost.unmountDrive("/dev/sdb1"), {
    success: false,
    error: "Error unmounting /dev/sdb1: target is busy",
  });
  assert.deepEqual(busy.calls, ["udisksctl unmount -b /dev/sdb1"]);
});
