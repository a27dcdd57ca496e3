import { Body, Controller, Get, HttpCode, HttpStatus, Post, Put, Req, UnauthorizedException } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiBody,
  ApiConflictResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiResponse,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse
} from '@nestjs/swagger';
import { PublicUser, toUserResponse, UserResponseDto } from '../users/user.entity';
import { UsersService } from '../users/users.service';
import { ChangePasswordDto, CredentialsDto, LoginResponseDto } from './auth.dto';
import { AuthService } from './auth.service';
import { Public } from './decorators/public.decorator';
import type { AuthenticatedRequest } from './interfaces/authenticated-request';
import type { TokenClaims } from './interfaces/token-claims';

function claimsOf(req: AuthenticatedRequest): TokenClaims {
  // JwtAuthGuard runs on every non-public route, so this only trips on misconfiguration.
  if (!req.user) {
    throw new UnauthorizedException('Unauthorized');
  }
  return req.user;
}

@ApiTags('Auth')
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService, private readonly usersService: UsersService) {}

  @Public()
  @Post('register')
  @ApiOperation({ summary: 'Register a new account with the user role' })
  @ApiBody({ type: CredentialsDto })
  @ApiResponse({ status: 201, description: 'User created', type: UserResponseDto })
  @ApiConflictResponse({ description: 'Username already registered' })
  @ApiUnprocessableEntityResponse({ description: 'Invalid input data' })
  async register(@Body() dto: CredentialsDto): Promise<PublicUser> {
    return toUserResponse(await this.authService.register(dto.username, dto.password));
  }

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange username and password for an access token' })
  @ApiBody({ type: CredentialsDto })
  @ApiResponse({ status: 200, description: 'Token issued', type: LoginResponseDto })
  @ApiUnauthorizedResponse({ description: 'Incorrect username or password' })
  login(@Body() dto: CredentialsDto): Promise<LoginResponseDto> {
    return this.authService.login(dto.username, dto.password);
  }

  @Get('me')
  @ApiBearerAuth('bearer')
  @ApiOperation({ summary: 'Current user' })
  @ApiResponse({ status: 200, description: 'Authenticated user', type: UserResponseDto })
  @ApiUnauthorizedResponse({ description: 'Missing or invalid JWT token' })
  @ApiNotFoundResponse({ description: 'Token subject no longer exists' })
  async me(@Req() req: AuthenticatedRequest): Promise<PublicUser> {
    return toUserResponse(await this.usersService.findByUsername(claimsOf(req).username));
  }

  @Put('password')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiBearerAuth('bearer')
  @ApiOperation({ summary: 'Change the current user password' })
  @ApiBody({ type: ChangePasswordDto })
  @ApiResponse({ status: 204, description: 'Password changed' })
  @ApiUnauthorizedResponse({ description: 'Missing token or wrong current password' })
  async changePassword(@Req() req: AuthenticatedRequest, @Body() dto: ChangePasswordDto): Promise<void> {
    await this.usersService.changePassword(claimsOf(req).username, dto.currentPassword, dto.newPassword);
  }
}
