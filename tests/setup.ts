/**
 * 测试环境设置
 *
 * @description 设置测试环境变量，关闭日志输出。数据库与主机由各测试中的假实现代替。
 * @since 1.0.0
 */

// 日志级别必须在加载 logger 之前设置
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.MYSQL_HOST = 'localhost';
process.env.MYSQL_PORT = '3306';
process.env.MYSQL_USER = 'test_user';
process.env.MYSQL_PASSWORD = 'test_password';

// 防止本地 .env 中的推理服务密钥影响测试
delete process.env.ANTHROPIC_API_KEY;

beforeAll(() => {
  jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterAll(() => {
  jest.restoreAllMocks();
});
