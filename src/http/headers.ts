const USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const ACCEPT_LANGUAGE = 'zh-CN,zh;q=0.9,en;q=0.8';
const ACCEPT_ENCODING = 'gzip, deflate, br';

export function pageHeaders(baseUrl: string): Record<string, string> {
  return {
    'User-Agent': USER_AGENT,
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7',
    'Accept-Language': ACCEPT_LANGUAGE,
    'Accept-Encoding': ACCEPT_ENCODING,
    'Upgrade-Insecure-Requests': '1',
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
    'Sec-Fetch-User': '?1',
    'Cache-Control': 'max-age=0',
    'Referer': `${baseUrl}/`,
  };
}

export function imageHeaders(baseUrl: string): Record<string, string> {
  return {
    'User-Agent': USER_AGENT,
    'Accept': 'image/avif,image/webp,image/apng,image/svg+xml,image/*,*/*;q=0.8',
    'Accept-Language': ACCEPT_LANGUAGE,
    'Accept-Encoding': ACCEPT_ENCODING,
    'Sec-Fetch-Dest': 'image',
    'Sec-Fetch-Mode': 'no-cors',
    'Sec-Fetch-Site': 'cross-site',
    'Referer': `${baseUrl}/`,
  };
}
