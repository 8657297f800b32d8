export { RegisterDto } from './register.dto';
export { LoginDto } from './login.dto';
export { LoginResponseDto, RegisterResponseDto } from './auth-response.dto';
