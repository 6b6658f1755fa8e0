/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const HEADER = 'host\tidentity\tuser\ttime\trequest\tstatus\tbytes\treferrer\tagent\n';

export const FRANK_LINE =
  '127.0.0.1 - frank [10/Oct/2000:13:55:36 -0700] "GET /apache_pb.gif HTTP/1.0" 200 2326 "http://ref/" "Mozilla/5.0"\n';
export const FRANK_RECORD =
  '127.0.0.1\t-\tfrank\t2000-10-10T13:55:36-0700\tGET /apache_pb.gif HTTP/1.0\t200\t2326\thttp://ref/\tMozilla/5.0\n';

export const LOGIN_LINE =
  '10.0.0.2 - - [01/Jan/2024:00:00:01 +0000] "POST /login HTTP/1.1" 302 0 "-" "curl/8.4.0"\n';
export const LOGIN_RECORD =
  '10.0.0.2\t-\t-\t2024-01-01T00:00:01+0000\tPOST /login HTTP/1.1\t302\t0\t-\tcurl/8.4.0\n';

/** Request quote never closes. */
export const UNCLOSED_REQUEST_LINE =
  '10.0.0.3 - - [01/Jan/2024:00:00:02 +0000] "GET / HTTP/1.1\n';
